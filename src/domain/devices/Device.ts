// domain/devices/Device.ts
// Intent: Shared connection protocol for every device variant
// Reasoning: Capacities are fixed at construction and only checked when a stream is connected

import { v4 as uuidv4 } from "uuid";
import { Stream } from "../nodes/Stream";
import { FlowError, type Port } from "../../core/FlowError";
import { sumFlows } from "../../core/FlowHelpers";

export type DeviceKind = "mixer" | "reactor";

export type WiringState = "unwired" | "partially-wired" | "fully-wired";

export abstract class Device {
  abstract readonly kind: DeviceKind;
  readonly id: string = uuidv4();

  protected readonly inputs: Stream[] = [];
  protected readonly outputs: Stream[] = [];

  protected constructor(
    readonly inputAmount: number,
    readonly outputAmount: number
  ) {
    this.assertCapacity("input", inputAmount);
    this.assertCapacity("output", outputAmount);
  }

  addInput(stream: Stream): void {
    if (this.inputs.length >= this.inputAmount) {
      throw this.capacityExceeded("input");
    }
    this.inputs.push(stream);
  }

  addOutput(stream: Stream): void {
    if (this.outputs.length >= this.outputAmount) {
      throw this.capacityExceeded("output");
    }
    this.outputs.push(stream);
  }

  // Copies, so callers can't rewire the device through the returned array
  getInputs(): Stream[] {
    return [...this.inputs];
  }

  getOutputs(): Stream[] {
    return [...this.outputs];
  }

  totalInputFlow(): number {
    return sumFlows(this.inputs);
  }

  totalOutputFlow(): number {
    return sumFlows(this.outputs);
  }

  wiringState(): WiringState {
    const connected = this.inputs.length + this.outputs.length;
    if (connected === 0) return "unwired";
    if (this.inputs.length === this.inputAmount && this.outputs.length === this.outputAmount) {
      return "fully-wired";
    }
    return "partially-wired";
  }

  abstract updateOutputs(): void;

  // Capacities count streams, so only whole non-negative numbers make sense
  private assertCapacity(port: Port, amount: number): void {
    if (!Number.isInteger(amount) || amount < 0) {
      throw new FlowError({
        code: "INVALID_CAPACITY",
        message: `Invalid ${port} capacity ${amount}: expected a non-negative integer`,
        deviceFamily: "GENERIC",
        deviceId: this.id,
        port,
      });
    }
  }

  protected capacityExceeded(port: Port): FlowError {
    return new FlowError({
      code: "CAPACITY_EXCEEDED",
      message: port === "input" ? "INPUT STREAM LIMIT!" : "OUTPUT STREAM LIMIT!",
      deviceFamily: "GENERIC",
      deviceId: this.id,
      port,
    });
  }
}
