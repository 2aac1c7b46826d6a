import { Hono, type Context } from 'hono';
import { ParameterError } from '@pinebridge/shared';
import { PineClient, buildRequest, type PineAnswer, type RequestParams } from '@pinebridge/core';
import type { AppContext } from '../app.ts';

const PARAM_PREFIX = 'pine';
const OPERATION_PARAM = 'requesttype';

export type AnswerBody = Record<string, string | number>;

/** Lowercases and drops `-` and `_`, so `Pine-Request-Type` matches `pineRequestType`. */
export function normalizeKey(key: string): string {
  return key.toLowerCase().replace(/[-_]/g, '');
}

/**
 * Merges parameter sources into one map keyed by the name after the `pine`
 * prefix. Later sources win.
 */
export function collectParams(...sources: Record<string, unknown>[]): RequestParams {
  const params: Record<string, string> = {};
  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) {
      const normalized = normalizeKey(key);
      if (!normalized.startsWith(PARAM_PREFIX) || typeof value !== 'string') continue;
      params[normalized.slice(PARAM_PREFIX.length)] = value;
    }
  }
  return params;
}

/** JSON view of an answer. 64-bit values become decimal strings. */
export function renderAnswer(answer: PineAnswer): AnswerBody {
  const body: AnswerBody = { resultCode: answer.resultCode };
  switch (answer.kind) {
    case 'read8':
    case 'read16':
    case 'read32':
    case 'read64':
      if (answer.memoryValue !== undefined) {
        body['memoryValue'] = typeof answer.memoryValue === 'bigint' ? answer.memoryValue.toString() : answer.memoryValue;
      }
      break;
    case 'status':
      if (answer.status !== undefined) body['status'] = answer.status;
      break;
    case 'version':
      body['version'] = answer.version;
      break;
    case 'title':
      body['title'] = answer.title;
      break;
    case 'id':
      body['id'] = answer.id;
      break;
    case 'uuid':
      body['uuid'] = answer.uuid;
      break;
    case 'gameVersion':
      body['gameVersion'] = answer.gameVersion;
      break;
  }
  return body;
}

export function resultStatus(resultCode: number): 200 | 500 | 501 {
  if (resultCode === 0) return 200;
  if (resultCode === 0xff) return 500;
  return 501;
}

async function handle(c: Context<AppContext>, form: Record<string, unknown>) {
  const params = collectParams(c.req.query(), form, c.req.header());
  const operation = params[OPERATION_PARAM];
  if (operation === undefined || operation.trim() === '') {
    throw new ParameterError('no pineRequestType provided');
  }

  const request = buildRequest(operation, params);
  const client = new PineClient(c.get('session'), c.get('logger'));
  const answer = await client.execute(request);
  c.get('logger')?.debug({ kind: request.kind, resultCode: answer.resultCode }, 'served PINE request');
  return c.json(renderAnswer(answer), resultStatus(answer.resultCode));
}

export const pineRoutes = new Hono<AppContext>();

pineRoutes.get('/', (c) => handle(c, {}));

pineRoutes.post('/', async (c) => handle(c, await c.req.parseBody()));
