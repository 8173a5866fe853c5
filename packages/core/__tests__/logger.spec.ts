import { createLogger, toVerbosity } from '../src/util/logger.js';

describe('tiny logger', () => {
  it('obeys verbosity levels', () => {
    const sink: string[] = [];
    const log = createLogger(2, m => sink.push(m));

    log.log(3, 'low-prio');   // should be ignored
    log.log(1, 'important');
    expect(sink).toEqual(['1| important']);
  });

  it('honours a level changed after creation', () => {
    const sink: string[] = [];
    const log = createLogger(0, m => sink.push(m));

    log.log(2, 'hidden');
    log.level = 2;
    log.log(2, 'shown');
    expect(sink).toEqual(['2| shown']);
  });

  it('clamps flag counts into a verbosity', () => {
    expect(toVerbosity(0)).toBe(0);
    expect(toVerbosity(2)).toBe(2);
    expect(toVerbosity(9)).toBe(4);
    expect(toVerbosity(-3)).toBe(0);
    expect(toVerbosity(Number('nope'))).toBe(0);
  });
});
