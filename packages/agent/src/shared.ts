// Re-export shared types and schemas for the agent package
export * from '@daybrief/shared';
