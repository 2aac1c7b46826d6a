export { createApp, DEFAULT_HOST, DEFAULT_PORT } from './app.ts';
export type { AppContext, AppOptions, PineSession } from './app.ts';
export { collectParams, normalizeKey, renderAnswer, resultStatus } from './routes/pine.ts';
export type { AnswerBody } from './routes/pine.ts';
export { addressPort, startServer } from './node-server.ts';
export type { FetchApp, ServerOptions } from './node-server.ts';
