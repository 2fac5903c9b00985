import { describe, it, expect } from 'vitest';
import { Mixer, Reactor, describeDevice } from '../domain/devices';
import { TestHelper } from '../test-utils/TestHelper';

describe('Device connection protocol', () => {
  it('returns inputs and outputs in connection order', () => {
    const helper = new TestHelper();
    const [a, b, c, out] = helper.createStreams(4);
    const mixer = new Mixer(3);

    mixer.addInput(b);
    mixer.addInput(a);
    mixer.addInput(c);
    mixer.addOutput(out);

    expect(mixer.getInputs().map(s => s.getName())).toEqual(['s2', 's1', 's3']);
    expect(mixer.getInputs()[0]).toBe(b);
    expect(mixer.getOutputs()).toEqual([out]);
    expect(mixer.getOutputs()[0]).toBe(out);
  });

  it('hands out snapshots, not live views', () => {
    const helper = new TestHelper();
    const [feed, product, stray] = helper.createStreams(3);
    const reactor = new Reactor(false);
    reactor.addInput(feed);
    reactor.addOutput(product);

    const inputs = reactor.getInputs();
    inputs.push(stray);
    inputs.length = 0;
    reactor.getOutputs().pop();

    expect(reactor.getInputs()).toEqual([feed]);
    expect(reactor.getOutputs()).toEqual([product]);
  });

  it('shares a stream between an upstream output and a downstream input', () => {
    const helper = new TestHelper();
    const mixer = new Mixer(2);
    const reactor = new Reactor(true);
    const merged = helper.createStream();
    const [left, right] = helper.createStreams(2);

    mixer.addInput(helper.createStream(4));
    mixer.addInput(helper.createStream(6));
    mixer.addOutput(merged);
    reactor.addInput(merged);
    reactor.addOutput(left);
    reactor.addOutput(right);

    mixer.updateOutputs();
    reactor.updateOutputs();

    expect(reactor.getInputs()[0]).toBe(mixer.getOutputs()[0]);
    expect(merged.getMassFlow()).toBe(10);
    expect(left.getMassFlow()).toBe(5);
    expect(right.getMassFlow()).toBe(5);
  });

  it('tracks wiring state up to full', () => {
    const helper = new TestHelper();
    const reactor = new Reactor(true);
    expect(reactor.wiringState()).toBe('unwired');

    reactor.addInput(helper.createStream());
    expect(reactor.wiringState()).toBe('partially-wired');

    reactor.addOutput(helper.createStream());
    expect(reactor.wiringState()).toBe('partially-wired');

    reactor.addOutput(helper.createStream());
    expect(reactor.wiringState()).toBe('fully-wired');
  });

  it('sums connected flows on each side', () => {
    const helper = new TestHelper();
    const mixer = new Mixer(2);
    mixer.addInput(helper.createStream(1.5));
    mixer.addInput(helper.createStream(2));
    mixer.addOutput(helper.createStream(9));

    expect(mixer.totalInputFlow()).toBe(3.5);
    expect(mixer.totalOutputFlow()).toBe(9);
  });

  it('gives every device its own id', () => {
    expect(new Mixer(1).id).not.toBe(new Mixer(1).id);
    expect(new Reactor(false).id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('describes each variant', () => {
    expect(describeDevice(new Mixer(3))).toBe('Mixer(3 -> 1)');
    expect(describeDevice(new Reactor(false))).toBe('Reactor(single)');
    expect(describeDevice(new Reactor(true))).toBe('Reactor(double)');
  });
});
