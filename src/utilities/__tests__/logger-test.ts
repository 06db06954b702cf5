import { expect } from 'chai';
import { describe, it } from 'mocha';

import { createLogger, getDefaultLogger } from '../logger.js';

describe('logger', () => {
  it('creates a logger at the given level', () => {
    expect(createLogger('debug').level).to.equal('debug');
    expect(createLogger('silent').level).to.equal('silent');
  });

  it('rejects an unknown level', () => {
    expect(() => createLogger('loud')).to.throw(
      'Invalid LOG_LEVEL "loud". Must be one of: fatal, error, warn, info, debug, trace, silent',
    );
  });

  it('shares one default logger', () => {
    expect(getDefaultLogger()).to.equal(getDefaultLogger());
  });
});
