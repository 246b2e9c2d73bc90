export * from './constants/api.js';
export * from './constants/patch.js';
export * from './schemas/config.schema.js';
export * from './types/json.js';
export * from './types/openai.js';
export * from './types/request.js';
