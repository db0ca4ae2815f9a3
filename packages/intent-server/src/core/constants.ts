// Shared constants for the intent server
export const SERVICE_NAME = 'netintent';

// Bumped whenever a tool name, input schema or result shape changes
export const TOOLSET_VERSION = '1.0.0';
