import type { KernelErrorCode } from "./types";

export class KernelError extends Error {
  readonly code: KernelErrorCode;

  constructor(code: KernelErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "KernelError";
    this.code = code;
  }
}

export function isKernelError(error: unknown, code?: KernelErrorCode): error is KernelError {
  if (!(error instanceof KernelError)) return false;
  return code === undefined || error.code === code;
}
