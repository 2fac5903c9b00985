import { Stream } from "../domain/nodes/Stream";
import { FlowError, isFlowError } from "../core/FlowError";

// Intent: Hand out stream ordinals for one scenario
// Reasoning: Uniqueness of default names is the caller's job, so the counter lives with the caller
export class StreamCounter {
  private current = 0;

  next(): number {
    return ++this.current;
  }

  reset(): void {
    this.current = 0;
  }

  get value(): number {
    return this.current;
  }
}

export class TestHelper {
  static runScenario<T>(scenarioName: string, scenarioFn: (helper: TestHelper) => T): T {
    console.log(`\n--- Running Scenario: ${scenarioName} ---`);
    const helper = new TestHelper();

    try {
      const result = scenarioFn(helper);
      console.log(`✅ ${scenarioName} Passed`);
      return result;
    } catch (error) {
      console.error(`❌ ${scenarioName} Failed:`, error);
      throw error;
    }
  }

  readonly counter = new StreamCounter();

  createStream(massFlow?: number): Stream {
    const stream = new Stream(this.counter.next());
    if (massFlow !== undefined) {
      stream.setMassFlow(massFlow);
    }
    return stream;
  }

  createStreams(count: number): Stream[] {
    return Array.from({ length: count }, () => this.createStream());
  }
}

// Runs fn and returns the FlowError it throws; anything else is rethrown
export function captureFlowError(fn: () => void): FlowError {
  try {
    fn();
  } catch (error) {
    if (isFlowError(error)) return error;
    throw error;
  }
  throw new Error("Expected a FlowError to be thrown");
}
