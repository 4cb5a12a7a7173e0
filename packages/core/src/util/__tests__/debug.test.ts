import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import debug from 'debug';
import { ArraySchemaNode } from '../../schema/array-schema';
import { captureBuildError } from '../../test-utils/build';
import { log } from '../debug';

describe('construction logging', () => {
  let lines: unknown[][];

  beforeEach(() => {
    lines = [];
    debug.enable('schemawright:*');
    for (const logger of [log.build, log.reject]) {
      logger.log = (...args: unknown[]) => lines.push(args);
    }
  });

  afterEach(() => {
    debug.disable();
  });

  it('traces successful constructions with family and depth', () => {
    new ArraySchemaNode({ minItems: 1 });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toEqual(expect.arrayContaining(['array', 1]));
  });

  it('traces the rule that rejected a construction', () => {
    captureBuildError(() => new ArraySchemaNode({ minItems: 3, maxItems: 1 }));

    expect(lines).toHaveLength(1);
    expect(lines[0]).toEqual(
      expect.arrayContaining([
        'array',
        'E111',
        'minItems cannot be greater than maxItems',
      ])
    );
  });
});
