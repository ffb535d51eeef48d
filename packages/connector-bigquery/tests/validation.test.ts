import { describe, expect, it } from 'vitest';
import { ConversionError } from '@rowbridge/core';
import { parseTableSchema } from '../src/index.js';
import { thrown } from './helpers.js';

describe('parseTableSchema', () => {
  it('accepts a schema object and upper-cases type keywords', () => {
    expect(
      parseTableSchema({
        fields: [
          { name: 'id', type: 'integer', mode: 'REQUIRED' },
          { name: 'inner', type: 'record', fields: [{ name: 'ok', type: 'bool' }] },
        ],
      })
    ).toEqual({
      fields: [
        { name: 'id', type: 'INTEGER', mode: 'REQUIRED' },
        { name: 'inner', type: 'RECORD', fields: [{ name: 'ok', type: 'BOOL' }] },
      ],
    });
  });

  it('accepts a bare field list', () => {
    expect(parseTableSchema([{ name: 'id', type: 'STRING' }])).toEqual({
      fields: [{ name: 'id', type: 'STRING' }],
    });
  });

  it('reports where the schema is malformed', () => {
    const error = thrown(() => parseTableSchema({ fields: [{ name: 'id', type: 'STRING', mode: 'OPTIONAL' }] }));
    expect(error).toBeInstanceOf(ConversionError);
    expect(error).toMatchObject({ code: 'SCHEMA_MISMATCH' });
    expect(error instanceof Error ? error.message : '').toMatch(/^Invalid table schema: fields\.0\.mode: /);
  });
});
