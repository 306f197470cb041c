export * from './types/api.js';
export * from './types/baseline.js';
export * from './types/brief.js';
export * from './types/daily-record.js';
export * from './types/device.js';
export * from './types/intervention.js';

export * from './schemas/common.schema.js';
export * from './schemas/daily-record.schema.js';
export * from './schemas/baseline.schema.js';
export * from './schemas/intervention.schema.js';
export * from './schemas/agent-tools.schema.js';
export * from './schemas/jobs.schema.js';
