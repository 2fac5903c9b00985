// core/Invariants.ts
// Intent: Check the physical invariants of a device after its outputs were recomputed
// Reasoning: Transfer laws conserve mass; a violation means wiring or input data is wrong

import type { AnyDevice } from "../domain/devices";
import type { ValidationResult } from "./ValidationResult";
import { flowsEqual } from "./FlowHelpers";
import { config } from "../config/env";

export class Invariants {
  // Intent: Total output flow must equal total input flow within tolerance
  static assertMassConservation(
    device: AnyDevice,
    tolerance: number = config.flowTolerance
  ): ValidationResult {
    const totalIn = device.totalInputFlow();
    const totalOut = device.totalOutputFlow();

    if (!flowsEqual(totalIn, totalOut, tolerance)) {
      return {
        ok: false,
        code: "MASS_NOT_CONSERVED",
        message: `Device ${device.id} receives ${totalIn} but emits ${totalOut} (tolerance ${tolerance}).`,
      };
    }

    return { ok: true };
  }

  // Intent: Mass flow is a non-negative scalar; streams themselves accept anything
  static assertNonNegativeFlows(device: AnyDevice): ValidationResult {
    const streams = [...device.getInputs(), ...device.getOutputs()];
    const negative = streams.filter(s => s.getMassFlow() < 0);

    if (negative.length > 0) {
      return {
        ok: false,
        code: "NEGATIVE_FLOW",
        message: `Negative mass flow on ${negative.map(s => s.getName()).join(", ")}.`,
      };
    }

    return { ok: true };
  }

  static assertFullyWired(device: AnyDevice): ValidationResult {
    if (device.wiringState() !== "fully-wired") {
      return {
        ok: false,
        code: "NOT_FULLY_WIRED",
        message: `Device ${device.id} has ${device.getInputs().length}/${device.inputAmount} inputs and ${device.getOutputs().length}/${device.outputAmount} outputs connected.`,
      };
    }

    return { ok: true };
  }

  // Intent: Run the flow checks and return only the failures
  // Wiring is not checked here: a mixer below its input capacity is still valid
  static validateDevice(device: AnyDevice, tolerance?: number): ValidationResult[] {
    const results: ValidationResult[] = [
      this.assertNonNegativeFlows(device),
      this.assertMassConservation(device, tolerance),
    ];

    return results.filter(r => !r.ok);
  }
}
