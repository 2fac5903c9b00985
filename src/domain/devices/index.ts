import { Mixer } from "./Mixer";
import { Reactor } from "./Reactor";

export { Device } from "./Device";
export type { DeviceKind, WiringState } from "./Device";
export { Mixer, MIXER_OUTPUTS } from "./Mixer";
export { Reactor } from "./Reactor";

// Closed set of device variants; switch on `kind` to narrow
export type AnyDevice = Mixer | Reactor;

export function describeDevice(device: AnyDevice): string {
  switch (device.kind) {
    case "mixer":
      return `Mixer(${device.inputAmount} -> ${device.outputAmount})`;
    case "reactor":
      return device.outputAmount === 2 ? "Reactor(double)" : "Reactor(single)";
  }
}
