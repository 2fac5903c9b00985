// domain/devices/Mixer.ts
import { Device } from "./Device";
import { FlowError, type Port } from "../../core/FlowError";
import { splitEvenly, sumFlows } from "../../core/FlowHelpers";

export const MIXER_OUTPUTS = 1;

/**
 * Merges any number of inputs (up to its capacity) into a single output.
 * The output receives the sum of all input flows.
 */
export class Mixer extends Device {
  readonly kind = "mixer" as const;

  constructor(inputCapacity: number) {
    super(inputCapacity, MIXER_OUTPUTS);
  }

  // Intent: Sum inputs and split the total evenly across outputs
  // An empty input list yields a zero flow, not an error
  updateOutputs(): void {
    const total = sumFlows(this.inputs);

    if (this.outputs.length === 0) {
      throw new FlowError({
        code: "PRECONDITION_VIOLATED",
        message: "Should set outputs before update",
        deviceFamily: "MIXER",
        deviceId: this.id,
        port: "output",
      });
    }

    splitEvenly(total, this.outputs);
  }

  protected capacityExceeded(port: Port): FlowError {
    return new FlowError({
      code: "CAPACITY_EXCEEDED",
      message: port === "input" ? "Too much inputs" : "Too much outputs",
      deviceFamily: "MIXER",
      deviceId: this.id,
      port,
    });
  }
}
