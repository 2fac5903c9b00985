export { Stream } from "./domain/nodes/Stream";
export { Device, Mixer, Reactor, MIXER_OUTPUTS, describeDevice } from "./domain/devices";
export type { AnyDevice, DeviceKind, WiringState } from "./domain/devices";
export { FlowError, isFlowError } from "./core/FlowError";
export type { FlowErrorCode, Port, DeviceFamily } from "./core/FlowError";
export { Invariants } from "./core/Invariants";
export type { ValidationResult, ValidationCode } from "./core/ValidationResult";
export { DeviceOperationService } from "./core/DeviceOperationService";
export { sumFlows, splitEvenly, flowsEqual } from "./core/FlowHelpers";
export { config, loadConfig } from "./config/env";
export type { FlowConfig } from "./config/env";
