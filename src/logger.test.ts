import { createModuleLogger, logger } from './logger';

describe('logger', () => {
  it('tags child loggers with their module', () => {
    const child = createModuleLogger('session');
    expect(child.bindings()).toMatchObject({ module: 'session' });
  });

  it('shares the root level with children', () => {
    expect(createModuleLogger('feedback').level).toBe(logger.level);
  });
});
