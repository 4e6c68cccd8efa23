import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { ConnectionGate } from '../src/connection-gate.js';

describe('ConnectionGate', () => {
  it('counts admitted requests until they are released', () => {
    const gate = new ConnectionGate();
    assert.equal(gate.admit(), true);
    assert.equal(gate.admit(), true);
    assert.equal(gate.openCount(), 2);

    gate.release();
    assert.equal(gate.openCount(), 1);
    gate.release();
    assert.equal(gate.openCount(), 0);
  });

  it('refuses admission after shutdown begins without touching the count', () => {
    const gate = new ConnectionGate();
    assert.equal(gate.admit(), true);

    gate.beginShutdown();
    assert.equal(gate.isStopped(), true);
    assert.equal(gate.admit(), false);
    assert.equal(gate.openCount(), 1);
  });

  it('treats repeated shutdown calls as one', () => {
    const gate = new ConnectionGate();
    gate.beginShutdown();
    gate.beginShutdown();
    assert.equal(gate.isStopped(), true);
    assert.equal(gate.openCount(), 0);
  });

  it('throws on a release without a matching admit', () => {
    const gate = new ConnectionGate();
    assert.throws(() => {
      gate.release();
    }, /release\(\) called without a matching admit\(\)/);
    assert.equal(gate.openCount(), 0);
  });

  it('shares state through its buffer', () => {
    const first = new ConnectionGate();
    const second = new ConnectionGate(first.buffer);

    assert.equal(first.admit(), true);
    assert.equal(second.openCount(), 1);

    second.beginShutdown();
    assert.equal(first.isStopped(), true);
    assert.equal(first.admit(), false);

    second.release();
    assert.equal(first.openCount(), 0);
  });

  it('never goes negative under interleaved admit and release', async () => {
    const gate = new ConnectionGate();
    let lowest = 0;

    await Promise.all(
      Array.from({ length: 200 }, async (_, index) => {
        assert.equal(gate.admit(), true);
        await new Promise<void>((resolve) => {
          setTimeout(resolve, index % 7);
        });
        gate.release();
        lowest = Math.min(lowest, gate.openCount());
      })
    );

    assert.equal(lowest, 0);
    assert.equal(gate.openCount(), 0);
  });
});
