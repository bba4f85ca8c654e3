import { errorMessage } from '../utils/index.js';

export function jsonResult(payload: unknown) {
  return {
    content: [{
      type: 'text' as const,
      text: JSON.stringify(payload, null, 2),
    }],
  };
}

export function errorResult(err: unknown) {
  return {
    content: [{ type: 'text' as const, text: `Error: ${errorMessage(err)}` }],
    isError: true,
  };
}
