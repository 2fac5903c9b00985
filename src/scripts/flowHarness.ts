import { Mixer, Reactor, describeDevice, type AnyDevice } from "../domain/devices";
import { Stream } from "../domain/nodes/Stream";
import { DeviceOperationService } from "../core/DeviceOperationService";
import { flowsEqual } from "../core/FlowHelpers";
import { TestHelper } from "../test-utils/TestHelper";
import { config } from "../config/env";
import { perf } from "../util/PerformanceMonitor";

interface FlowScenario {
  name: string;
  // Builds and wires the devices, upstream first
  build: (helper: TestHelper) => { devices: AnyDevice[]; streams: Stream[] };
  expected: Record<string, number>;
}

const scenarios: FlowScenario[] = [
  {
    name: "Mixer merges two feeds",
    build: (helper) => {
      const [a, b, out] = [helper.createStream(10), helper.createStream(5), helper.createStream()];
      const mixer = new Mixer(2);
      mixer.addInput(a);
      mixer.addInput(b);
      mixer.addOutput(out);
      return { devices: [mixer], streams: [a, b, out] };
    },
    expected: { s3: 15 },
  },
  {
    name: "Single reactor passes flow through",
    build: (helper) => {
      const [feed, product] = [helper.createStream(7), helper.createStream()];
      const reactor = new Reactor(false);
      reactor.addInput(feed);
      reactor.addOutput(product);
      return { devices: [reactor], streams: [feed, product] };
    },
    expected: { s2: 7 },
  },
  {
    name: "Double reactor splits evenly",
    build: (helper) => {
      const [feed, top, bottom] = [helper.createStream(10), helper.createStream(), helper.createStream()];
      const reactor = new Reactor(true);
      reactor.addInput(feed);
      reactor.addOutput(top);
      reactor.addOutput(bottom);
      return { devices: [reactor], streams: [feed, top, bottom] };
    },
    expected: { s2: 5, s3: 5 },
  },
  {
    name: "Mixer feeds a double reactor",
    build: (helper) => {
      const [a, b, merged, left, right] = [
        helper.createStream(12),
        helper.createStream(8),
        helper.createStream(),
        helper.createStream(),
        helper.createStream(),
      ];
      const mixer = new Mixer(2);
      mixer.addInput(a);
      mixer.addInput(b);
      mixer.addOutput(merged);

      // merged is the mixer's output and the reactor's input
      const reactor = new Reactor(true);
      reactor.addInput(merged);
      reactor.addOutput(left);
      reactor.addOutput(right);
      return { devices: [mixer, reactor], streams: [a, b, merged, left, right] };
    },
    expected: { s3: 20, s4: 10, s5: 10 },
  },
];

function runHarness(tests: FlowScenario[]) {
  for (const scenario of tests) {
    TestHelper.runScenario(scenario.name, (helper) => {
      const { devices, streams } = scenario.build(helper);
      console.log(`  🔧 ${devices.map(describeDevice).join(" -> ")}`);

      DeviceOperationService.updateInOrder(devices);
      streams.forEach(s => s.print());

      assertFlowsMatch(streams, scenario.expected);
    });
  }

  perf.report();
}

function assertFlowsMatch(streams: Stream[], expected: Record<string, number>) {
  const byName = new Map(streams.map((s) => [s.getName(), s]));

  for (const [name, flow] of Object.entries(expected)) {
    const stream = byName.get(name);
    if (!stream) {
      throw new Error(`Missing stream ${name}`);
    }
    if (!flowsEqual(stream.getMassFlow(), flow, config.flowTolerance)) {
      throw new Error(`${name}: expected ${flow}, received ${stream.getMassFlow()}`);
    }
  }
}

try {
  runHarness(scenarios);
} catch (error) {
  console.error("Flow harness failed", error);
  process.exit(1);
}
