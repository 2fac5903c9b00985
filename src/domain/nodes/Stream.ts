// domain/nodes/Stream.ts

/**
 * A named carrier of a scalar mass flow.
 *
 * Streams are shared by reference: the same instance can be one device's
 * output and another device's input. A stream knows nothing about the
 * devices wired to it.
 */
export class Stream {
  private name: string;
  private massFlow = 0;

  constructor(ordinal: number) {
    this.name = `s${ordinal}`;
  }

  setName(name: string): void {
    this.name = name;
  }

  getName(): string {
    return this.name;
  }

  // Not validated: negative flows pass through (see Invariants.assertNonNegativeFlows)
  setMassFlow(massFlow: number): void {
    this.massFlow = massFlow;
  }

  getMassFlow(): number {
    return this.massFlow;
  }

  // Six significant digits, like a default-formatted stdout double
  print(): void {
    console.log(`Stream ${this.name} flow = ${Number(this.massFlow.toPrecision(6))}`);
  }
}
