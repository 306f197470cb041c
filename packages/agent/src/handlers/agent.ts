/**
 * Agent Handlers
 *
 * Exposes the agent tools over HTTP. The request body is the tool input.
 */

import { Router, type Request, type Response } from 'express';
import type { ApiError, ApiResponse } from '../shared.js';
import { executeAgentTool, isAgentToolName } from '../services/agent-tools.service.js';

export const agentRouter = Router();

// POST /agent/tools/:name
agentRouter.post('/tools/:name', (req: Request, res: Response): void => {
  const name = req.params['name'] ?? '';
  const result = executeAgentTool(name, req.body);

  if (!result.ok) {
    const response: ApiError = {
      success: false,
      error: {
        code: isAgentToolName(name) ? 'TOOL_ERROR' : 'UNKNOWN_TOOL',
        message: result.error,
      },
    };
    res.status(isAgentToolName(name) ? 400 : 404).json(response);
    return;
  }

  const response: ApiResponse<unknown> = { success: true, data: result.data };
  res.json(response);
});
