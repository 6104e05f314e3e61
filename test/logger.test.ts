import { expect } from 'chai';
import pino from 'pino';
import sinon from 'sinon';

import {
  TaggedLogger, fromPino, silentLogger, withLevel,
} from '../lib/logger';

function capture(level: pino.LevelWithSilent = 'debug') {
  const lines: Array<Record<string, unknown>> = [];
  const stream = {
    write(chunk: string) {
      lines.push(JSON.parse(chunk));
    },
  };
  return { lines, logger: fromPino(pino({ level, base: undefined }, stream)) };
}

describe('fromPino', () => {
  it('joins arguments into the message at the matching level', () => {
    const { lines, logger } = capture();

    logger.log('Syncing', 'TRV 1');
    logger.warn?.('Zone', { id: 'z1' });
    logger.debug?.('details');

    expect(lines.map((line) => [line.level, line.msg])).to.deep.equal([
      [30, 'Syncing TRV 1'],
      [40, 'Zone {"id":"z1"}'],
      [20, 'details'],
    ]);
  });

  it('attaches an error argument as err', () => {
    const { lines, logger } = capture();

    logger.error('Failed to sync temperature for TRV 1:', new Error('offline'));

    expect(lines).to.have.length(1);
    expect(lines[0].level).to.equal(50);
    expect(lines[0].msg).to.equal('Failed to sync temperature for TRV 1: offline');
    expect(lines[0].err).to.have.property('message', 'offline');
  });

  it('respects the configured level', () => {
    const { lines, logger } = capture('warn');

    logger.log('hidden');
    logger.debug?.('hidden');
    logger.error('shown');

    expect(lines.map((line) => line.msg)).to.deep.equal(['shown']);
  });
});

describe('TaggedLogger', () => {
  it('prefixes every line with its tag', () => {
    const target = {
      log: sinon.stub(), warn: sinon.stub(), error: sinon.stub(), debug: sinon.stub(),
    };
    const log = new TaggedLogger(() => target, 'SyncEngine');

    log.info('hello', 1);
    log.warn('careful');
    log.error('broken', 'detail');
    log.debug('noise');

    expect(target.log.firstCall.args).to.deep.equal(['[SyncEngine] hello', 1]);
    expect(target.warn.firstCall.args).to.deep.equal(['[SyncEngine] careful']);
    expect(target.error.firstCall.args).to.deep.equal(['[SyncEngine] broken', 'detail']);
    expect(target.debug.firstCall.args).to.deep.equal(['[SyncEngine] noise']);
  });

  it('falls back to log for warnings and drops debug output when the target has neither', () => {
    const target = { log: sinon.stub(), error: sinon.stub() };
    const log = new TaggedLogger(() => target, 'Discovery');

    log.warn('missing entities');
    log.debug('ignored');

    expect(target.log.callCount).to.equal(1);
    expect(target.log.firstCall.args).to.deep.equal(['[Discovery] missing entities']);
  });

  it('resolves the target on every call', () => {
    let current = silentLogger;
    const log = new TaggedLogger(() => current, 'ClimateSync');
    log.info('before');

    const later = { log: sinon.stub(), error: sinon.stub() };
    current = later;
    log.info('after');

    expect(later.log.firstCall.args).to.deep.equal(['[ClimateSync] after']);
  });
});

describe('withLevel', () => {
  function target() {
    return {
      log: sinon.stub(), warn: sinon.stub(), error: sinon.stub(), debug: sinon.stub(),
    };
  }

  it('drops calls below the level and always passes errors', () => {
    const inner = target();
    const logger = withLevel(inner, 'error');

    logger.log('info line');
    logger.warn?.('warn line');
    logger.debug?.('debug line');
    logger.error('error line', 1);

    expect(inner.log.called).to.equal(false);
    expect(inner.warn.called).to.equal(false);
    expect(inner.debug.called).to.equal(false);
    expect(inner.error.firstCall.args).to.deep.equal(['error line', 1]);
  });

  it('keeps info and warnings at info level', () => {
    const inner = target();
    const logger = withLevel(inner, 'info');

    logger.log('info line');
    logger.warn?.('warn line');
    logger.debug?.('debug line');

    expect(inner.log.firstCall.args).to.deep.equal(['info line']);
    expect(inner.warn.firstCall.args).to.deep.equal(['warn line']);
    expect(inner.debug.called).to.equal(false);
  });

  it('sends warnings to log when the target has no warn', () => {
    const inner = { log: sinon.stub(), error: sinon.stub() };

    withLevel(inner, 'debug').warn?.('careful');

    expect(inner.log.firstCall.args).to.deep.equal(['careful']);
  });
});
