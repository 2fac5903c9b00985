import type { AnyDevice } from "../domain/devices";
import { Invariants } from "./Invariants";
import { perf } from "../util/PerformanceMonitor";

export class DeviceOperationService {
  // Intent: Recompute a device's outputs, then reject the result if any invariant broke
  // Errors from updateOutputs (FlowError) propagate untouched
  static updateAndValidate(device: AnyDevice, tolerance?: number): AnyDevice {
    return perf.measure(`DeviceOperationService.updateAndValidate[${device.kind}]`, () => {
      device.updateOutputs();

      const violations = Invariants.validateDevice(device, tolerance);
      if (violations.length > 0) {
        const messages = violations.map(v => `${v.code}: ${v.message}`).join("; ");
        throw new Error(`Device validation failed: ${messages}`);
      }

      return device;
    });
  }

  // Intent: Update a flat list of devices in the order given by the caller
  // Reasoning: Devices sharing a stream are order-dependent; upstream devices go first
  static updateInOrder(devices: AnyDevice[], tolerance?: number): void {
    for (const device of devices) {
      this.updateAndValidate(device, tolerance);
    }
  }
}
