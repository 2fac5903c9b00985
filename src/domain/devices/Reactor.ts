// domain/devices/Reactor.ts
import { Device } from "./Device";
import { FlowError } from "../../core/FlowError";
import { splitEvenly } from "../../core/FlowHelpers";

const REACTOR_INPUTS = 1;

/**
 * Takes exactly one input and splits it evenly across one output,
 * or two when built as a double reactor.
 */
export class Reactor extends Device {
  readonly kind = "reactor" as const;

  constructor(isDouble: boolean) {
    super(REACTOR_INPUTS, isDouble ? 2 : 1);
  }

  updateOutputs(): void {
    if (this.inputs.length < this.inputAmount) {
      throw this.missingConnection("input", this.inputs.length, this.inputAmount);
    }
    if (this.outputs.length < this.outputAmount) {
      throw this.missingConnection("output", this.outputs.length, this.outputAmount);
    }

    const inputMass = this.inputs[0].getMassFlow();
    splitEvenly(inputMass, this.outputs);
  }

  private missingConnection(port: "input" | "output", connected: number, required: number): FlowError {
    return new FlowError({
      code: "MISSING_CONNECTION",
      message: `Reactor needs ${required} ${port} stream(s) before update, ${connected} connected`,
      deviceFamily: "GENERIC",
      deviceId: this.id,
      port,
    });
  }
}
