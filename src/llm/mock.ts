import type { ModelTurn } from '../schema/model.js';
import type { ModelClient, ModelRequest } from './client.js';

export type MockResponse = ModelTurn | string | Error;

export type MockResponder = (
  request: ModelRequest,
  callIndex: number,
) => MockResponse | Promise<MockResponse>;

/**
 * Mock model provider for testing and dry runs.
 *
 * Given a list, it plays the responses back in order and then falls back to
 * a default final answer naming the calling agent. Given a function, it asks
 * the function for every call. Strings become final answers; `Error`s are
 * thrown.
 */
export function createMockClient(
  responses?: readonly MockResponse[] | MockResponder,
): ModelClient {
  let callIndex = 0;

  return {
    async invoke(request: ModelRequest): Promise<ModelTurn> {
      const index = callIndex;
      callIndex++;

      const response = typeof responses === 'function'
        ? await responses(request, index)
        : responses?.[index] ?? defaultResponse(request);

      if (response instanceof Error) throw response;
      if (typeof response === 'string') return { type: 'final', text: response };
      return response;
    },
  };
}

function defaultResponse(request: ModelRequest): string {
  return `[mock] ${request.agent} response to: ${request.input}`;
}
