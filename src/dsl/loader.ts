/**
 * Pipeline file loading.
 */

import { promises as fs } from 'fs';
import { TypedError, pipelineNotFoundError, pipelineParseError } from '../domain/errors';

/** Raised when a pipeline file cannot be read or parsed. */
export class PipelineLoadError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'PipelineLoadError';
  }
}

/** Read and parse a pipeline document. The result is not yet validated. */
export async function loadPipeline(filePath: string): Promise<unknown> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'EISDIR')) {
      throw new PipelineLoadError(pipelineNotFoundError(filePath));
    }
    throw err;
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    throw new PipelineLoadError(pipelineParseError(filePath, err instanceof Error ? err.message : String(err)));
  }
}
