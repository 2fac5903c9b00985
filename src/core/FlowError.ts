// core/FlowError.ts
// Intent: One error type for every contract violation raised by devices

export type FlowErrorCode =
  | "CAPACITY_EXCEEDED"
  | "PRECONDITION_VIOLATED"
  | "MISSING_CONNECTION"
  | "INVALID_CAPACITY";

export type Port = "input" | "output";

// GENERIC: the base Device connection guard. MIXER: the mixer's own guard.
export type DeviceFamily = "GENERIC" | "MIXER";

export class FlowError extends Error {
  readonly code: FlowErrorCode;
  readonly port?: Port;
  readonly deviceFamily: DeviceFamily;
  readonly deviceId: string;

  constructor(params: {
    code: FlowErrorCode;
    message: string;
    deviceFamily: DeviceFamily;
    deviceId: string;
    port?: Port;
  }) {
    super(params.message);
    this.name = "FlowError";
    this.code = params.code;
    this.port = params.port;
    this.deviceFamily = params.deviceFamily;
    this.deviceId = params.deviceId;
  }
}

export function isFlowError(error: unknown): error is FlowError {
  return error instanceof FlowError;
}
