import { BackendError } from "../errors.js";

/** Runs `read` over a response body, reporting an unexpected shape as a rejected request. */
export function readResponse<T>(label: string, read: () => T): T {
  try {
    return read();
  } catch (error) {
    if (error instanceof BackendError) {
      throw error;
    }
    const detail = error instanceof Error ? error.message : String(error);
    throw new BackendError("ValidationError", `Unexpected ${label} response: ${detail}`, { cause: error });
  }
}
