import type { ModelRequest, ModelResponse } from '../entities/Model.js';

/**
 * Interface for the hosted model API client
 */
export interface IModelClient {
  /**
   * Perform a single chat-completion call.
   * Classified failures resolve as `{ ok: false }`; the promise only rejects
   * with `RequestCancelledError` when `abortSignal` fires.
   */
  send(request: ModelRequest, abortSignal?: AbortSignal): Promise<ModelResponse>;
}
