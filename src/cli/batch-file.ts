import { readFile } from 'node:fs/promises';
import JSON5 from 'json5';
import { errorMessage } from '../errors.js';
import type { PromptPayload } from '../providers/http.js';
import { isPromptPayload, isRecord } from '../providers/http.js';

export interface BatchEntry {
  provider?: string;
  payload: PromptPayload;
}

/**
 * A batch file is a JSON5 array of prompt payloads; an entry may also name
 * the provider it should go to.
 */
export function parseBatchFile(content: string, source = 'batch file'): BatchEntry[] {
  let parsed: unknown;
  try {
    parsed = JSON5.parse(content);
  } catch (err) {
    throw new Error(`${source}: ${errorMessage(err)}`);
  }
  if (!Array.isArray(parsed)) {
    throw new Error(`${source}: expected an array of prompts`);
  }

  return parsed.map((item: unknown, i): BatchEntry => {
    if (!isRecord(item)) {
      throw new Error(`${source}: entry ${i} must be an object`);
    }
    const { provider, ...rest } = item;
    if (provider !== undefined && typeof provider !== 'string') {
      throw new Error(`${source}: entry ${i} has a non-string provider`);
    }
    if (!isPromptPayload(rest)) {
      throw new Error(`${source}: entry ${i} needs a non-empty "prompt"`);
    }
    return provider === undefined ? { payload: rest } : { provider, payload: rest };
  });
}

export async function readBatchFile(path: string): Promise<BatchEntry[]> {
  const content = await readFile(path, 'utf-8');
  return parseBatchFile(content, path);
}
