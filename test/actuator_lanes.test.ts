import { expect } from 'chai';

import { ActuatorLanes } from '../lib/actuatorLanes';

describe('ActuatorLanes', () => {
  it('runs work for one id in order, even after a failure', async () => {
    const lanes = new ActuatorLanes();
    const order: string[] = [];

    const first = lanes.run('trv1', async () => {
      await new Promise((resolve) => setImmediate(resolve));
      order.push('first');
      throw new Error('write failed');
    });
    const second = lanes.run('trv1', async () => {
      order.push('second');
      return 2;
    });

    expect(lanes.isBusy('trv1')).to.equal(true);
    const results = await Promise.allSettled([first, second]);

    expect(order).to.deep.equal(['first', 'second']);
    expect(results.map((result) => result.status)).to.deep.equal(['rejected', 'fulfilled']);
    expect(await second).to.equal(2);
  });

  it('does not make different ids wait on each other', async () => {
    const lanes = new ActuatorLanes();
    const order: string[] = [];
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const slow = lanes.run('trv1', async () => {
      await gate;
      order.push('trv1');
    });
    await lanes.run('trv2', async () => {
      order.push('trv2');
    });
    release();
    await slow;

    expect(order).to.deep.equal(['trv2', 'trv1']);
  });

  it('forgets an id once its work has settled', async () => {
    const lanes = new ActuatorLanes();

    await lanes.run('trv1', async () => 'done');
    await Promise.all(lanes.pending());

    expect(lanes.isBusy('trv1')).to.equal(false);
    expect(lanes.pending()).to.have.length(0);
  });
});
