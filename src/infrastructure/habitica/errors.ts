import axios from "axios";
import { TransportError } from "../../shared/utils/errors";

// wrap whatever axios threw; response statuses never reach here
export function toTransportError(error: unknown, action: string): TransportError {
  if (axios.isCancel(error)) {
    return new TransportError(`${action} was aborted`);
  }

  if (axios.isAxiosError(error)) {
    if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
      return new TransportError(`${action} timed out`, { code: error.code });
    }
    return new TransportError(`${action} failed: ${error.message}`, { code: error.code });
  }

  if (error instanceof Error) {
    return new TransportError(`${action} failed: ${error.message}`);
  }

  return new TransportError(`${action} failed`);
}
