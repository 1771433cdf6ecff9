/**
 * Remote agent RPC envelope.
 *
 * Any service that accepts the request shape and answers with one of the
 * response shapes is interoperable.
 */

export const DELEGATE_METHOD = 'task.delegate';

export interface DelegateRequest {
  jsonrpc: '2.0';
  method: typeof DELEGATE_METHOD;
  params: {
    task_text: string;
    correlation_id: string;
  };
  id: number;
}

export interface DelegateSuccess {
  result: { text: string };
  id: number | string | null;
}

export interface DelegateFailure {
  error: { code: number | string; message: string };
  id: number | string | null;
}

export type DelegateResponse = DelegateSuccess | DelegateFailure;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isId(value: unknown): value is number | string | null {
  return value === null || typeof value === 'number' || typeof value === 'string';
}

/**
 * Narrow an untrusted response body. Returns null when it matches neither shape.
 */
export function parseDelegateResponse(body: unknown): DelegateResponse | null {
  if (!isRecord(body)) return null;

  const id = body.id === undefined ? null : body.id;
  if (!isId(id)) return null;

  const error = body.error;
  if (isRecord(error)) {
    const code = error.code;
    const message = error.message;
    if ((typeof code === 'number' || typeof code === 'string') && typeof message === 'string') {
      return { error: { code, message }, id };
    }
    return null;
  }

  const result = body.result;
  if (isRecord(result) && typeof result.text === 'string') {
    return { result: { text: result.text }, id };
  }

  return null;
}

export function isDelegateFailure(response: DelegateResponse): response is DelegateFailure {
  return 'error' in response;
}
