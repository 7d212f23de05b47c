export type { HttpClient } from './http-client.js';
export type { Logger } from './logger.js';
