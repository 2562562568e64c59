/**
 * Policy Tour
 * Runs the same indexing operations against a legacy and a strict table
 * and prints what each one hands back.
 */

import { ColumnVector, LengthMismatchError, Table, configure } from '../src/index';

configure({ echoWarnings: true });

console.log('='.repeat(70));
console.log('Policy Tour - legacy vs strict indexing');
console.log('='.repeat(70));

const letters = 'abcdefghijklmnopqrstuvwxyz'.split('');
const legacy = Table.make(
  {
    letters_lower: letters,
    letters_upper: letters.map((l) => l.toUpperCase()),
    values: letters.map((_, i) => i + 1),
  },
  'legacy',
);
const strict = legacy.withPolicy('strict');

function show(label: string, value: unknown): void {
  if (value instanceof Table) {
    const { names, rowCount } = value.describe();
    console.log(`${label}: table [${rowCount} x ${names.length}] (${names.join(', ')})`);
  } else if (value instanceof ColumnVector) {
    console.log(`${label}: ${value.kind} vector of ${value.length}`);
  } else {
    console.log(`${label}: ${String(value)}`);
  }
}

// ============================================================================
// 1. Name access
// ============================================================================

console.log('\n1. col() - partial names');
show('legacy col("val")', legacy.col('val').value);
show('legacy col("let")', legacy.col('let').value);
show('strict col("val")', strict.col('val').value);

// ============================================================================
// 2. Dropping
// ============================================================================

console.log('\n2. subset() - one column');
show('legacy subset(null, "values")', legacy.subset(null, 'values').value);
show('strict subset(null, "values")', strict.subset(null, 'values').value);
show('either select("values")', legacy.select('values').value);

// ============================================================================
// 3. Chained extraction
// ============================================================================

console.log('\n3. extract() - compound keys');
show('legacy extract([1, 3])', legacy.extract([1, 3]).value);
try {
  strict.extract([1, 3]);
} catch (error) {
  console.log(`strict extract([1, 3]): ${error instanceof Error ? error.name : String(error)}`);
}

// ============================================================================
// 4. Recycling
// ============================================================================

console.log('\n4. assign() - short sources');
const recycled = legacy.assign('flag', [true, false]);
show('legacy assign two values', recycled.table.col('flag').value);

const rejected = legacy.assign('flag', [1, 2, 3]);
console.log(`legacy assign three values applied: ${rejected.applied}`);

try {
  strict.assign('flag', [true, false]);
} catch (error) {
  if (!(error instanceof LengthMismatchError)) throw error;
  console.log(error.format());
}

// ============================================================================
// 5. Row-major construction
// ============================================================================

console.log('\n5. fromRows()');
const built = Table.fromRows(['~letters', '~numbers'], ['a', 1, 'b', 2, 'c', 3]);
console.log(built.describe());
console.log(built.toArray());
