import { describe, expect, it } from 'vitest';
import { Gate } from './gate.js';

describe('Gate', () => {
  it('acquires immediately when open', async () => {
    const gate = new Gate();
    await gate.acquire();
    expect(gate.locked).toBe(true);
  });

  it('blocks a second acquire until release', async () => {
    const gate = new Gate();
    await gate.acquire();

    let entered = false;
    const waiting = gate.acquire().then(() => {
      entered = true;
    });
    await Promise.resolve();
    expect(entered).toBe(false);

    gate.release();
    await waiting;
    expect(entered).toBe(true);
    expect(gate.locked).toBe(true);
  });

  it('serves waiters in order', async () => {
    const gate = new Gate();
    await gate.acquire();
    const order: string[] = [];
    const a = gate.acquire().then(() => order.push('a'));
    const b = gate.acquire().then(() => order.push('b'));

    gate.release();
    await a;
    gate.release();
    await b;
    expect(order).toEqual(['a', 'b']);
  });

  it('opens once the last holder releases', async () => {
    const gate = new Gate();
    await gate.acquire();
    gate.release();
    expect(gate.locked).toBe(false);
  });

  it('throws when released while open', () => {
    expect(() => new Gate().release()).toThrow('Gate released while not locked');
  });
});
