//
//
//

import { getLogger, setLogLevel } from '../logger';

describe('getLogger', () => {
  const envLevel = process.env.LOG_LEVEL;

  afterEach(() => {
    setLogLevel('info');
    if (envLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = envLevel;
    }
  });

  test('is silent under test', () => {
    expect(getLogger('test').silent).toBe(true);
  });

  test('uses the level set before creation', () => {
    setLogLevel('debug');

    expect(getLogger('test').level).toBe('debug');
  });

  test('falls back to info for an unknown level', () => {
    setLogLevel('loud');
    const logger = getLogger('test');

    expect(logger.level).toBe('info');
    expect(logger.isLevelEnabled('error')).toBe(true);
  });

  test('ignores LOG_LEVEL until the configuration sets it', () => {
    process.env.LOG_LEVEL = 'loud';
    const logger = getLogger('main');

    expect(logger.level).toBe('info');
    expect(logger.isLevelEnabled('error')).toBe(true);
  });
});
