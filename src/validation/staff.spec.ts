import { InvalidInputError } from '../errors';
import { parseStaffSubmission } from './staff';

const valid = {
  name: 'Amaka Obi',
  role: 'Accountant',
  basic: '20000',
  housing: '5000',
  transport: '3000',
  feeding: '2000',
};

function issuesFor(raw: unknown) {
  try {
    parseStaffSubmission(raw);
  } catch (err) {
    if (err instanceof InvalidInputError) return err.issues;
    throw err;
  }
  throw new Error('expected InvalidInputError');
}

describe('parseStaffSubmission', () => {
  it('coerces form text into a typed, frozen value', () => {
    const input = parseStaffSubmission({ ...valid, name: '  Amaka Obi ', basic: ' 20000.50 ' });

    expect(input).toEqual({
      name: 'Amaka Obi',
      role: 'Accountant',
      basic: 20000.5,
      housing: 5000,
      transport: 3000,
      feeding: 2000,
    });
    expect(Object.isFrozen(input)).toBe(true);
  });

  it('accepts numbers from JSON bodies, including zero', () => {
    const input = parseStaffSubmission({ ...valid, basic: 1500, feeding: 0 });
    expect(input.basic).toBe(1500);
    expect(input.feeding).toBe(0);
  });

  it('rejects a non-numeric amount', () => {
    expect(() => parseStaffSubmission({ ...valid, basic: 'abc' })).toThrow(InvalidInputError);
    expect(issuesFor({ ...valid, basic: 'abc' })).toEqual([{ field: 'basic', message: 'must be a number' }]);
  });

  it('accepts only decimal notation for amounts', () => {
    expect(parseStaffSubmission({ ...valid, basic: '1.5e3' }).basic).toBe(1500);
    expect(parseStaffSubmission({ ...valid, basic: '.5' }).basic).toBe(0.5);
    expect(parseStaffSubmission({ ...valid, basic: '+12' }).basic).toBe(12);
    for (const literal of ['0x10', '0b101', '0o7', '1_000', '12abc']) {
      expect(issuesFor({ ...valid, basic: literal })).toEqual([{ field: 'basic', message: 'must be a number' }]);
    }
  });

  it('stores negative zero as zero', () => {
    expect(Object.is(parseStaffSubmission({ ...valid, housing: '-0' }).housing, 0)).toBe(true);
    expect(Object.is(parseStaffSubmission({ ...valid, housing: -0 }).housing, 0)).toBe(true);
  });

  it('rejects negative and non-finite amounts', () => {
    expect(issuesFor({ ...valid, housing: '-1' })).toEqual([{ field: 'housing', message: 'must not be negative' }]);
    expect(issuesFor({ ...valid, transport: 'Infinity' })).toEqual([{ field: 'transport', message: 'must be a number' }]);
  });

  it('reports every missing or blank field', () => {
    expect(issuesFor({ role: '   ', basic: '', housing: '5000', transport: '3000', feeding: '2000' })).toEqual([
      { field: 'name', message: 'is required' },
      { field: 'role', message: 'is required' },
      { field: 'basic', message: 'is required' },
    ]);
  });

  it('rejects a submission that is not an object', () => {
    expect(issuesFor(undefined)).toEqual([{ field: 'submission', message: 'Required' }]);
  });

  it('builds a readable error message', () => {
    expect(() => parseStaffSubmission({ ...valid, name: 42 })).toThrow('Invalid staff details: name must be text');
  });
});
