/**
 * Standalone continuous fuzzer for BoundedStream.
 *
 * Replays random operation sequences against the window model in a loop,
 * printing the seed of every case that disagrees.
 *
 * Usage:
 *   npx tsx fuzzing/run.ts [--iterations N] [--seed N]
 */

import { Rng } from './generators/rng';
import { caseFromShape, checkCase, generateCase, formatOp, type StreamCase } from './generators/stream-ops';
import { WINDOW_SEEDS } from './seeds';

interface Failure {
  seed: number;
  strategy: string;
  violations: string[];
  testCase: StreamCase;
}

function main() {
  const args = process.argv.slice(2);
  let maxIterations = Infinity;
  let firstSeed = 1;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--iterations' && args[i + 1]) {
      maxIterations = parseInt(args[i + 1], 10);
      i++;
    } else if (args[i] === '--seed' && args[i + 1]) {
      firstSeed = parseInt(args[i + 1], 10);
      i++;
    }
  }

  console.log('BoundedStream Fuzzer');
  console.log(`Max iterations: ${maxIterations === Infinity ? 'unlimited' : maxIterations}`);
  console.log(`First seed: ${firstSeed}`);
  console.log('');

  let iteration = 0;
  let operations = 0;
  const failures: Failure[] = [];
  const startTime = Date.now();

  while (iteration < maxIterations) {
    const seed = firstSeed + iteration;
    const rng = new Rng(seed);
    let strategy: string;
    let testCase: StreamCase;

    if (iteration % 4 === 0) {
      const shape = WINDOW_SEEDS[(iteration / 4) % WINDOW_SEEDS.length];
      strategy = `shape:${shape.name}`;
      testCase = caseFromShape(rng, shape, { maxOps: 200 });
    } else {
      strategy = 'random';
      testCase = generateCase(rng, { maxData: 256, maxOps: 200 });
    }
    operations += testCase.ops.length;

    let violations: string[];
    try {
      violations = checkCase(testCase);
    } catch (err) {
      violations = [`threw ${err instanceof Error ? err.stack ?? err.message : String(err)}`];
    }
    if (violations.length > 0) {
      failures.push({ seed, strategy, violations, testCase });
      console.error(`\n[!] FAILURE at seed ${seed} (${strategy}): ${violations[0]}`);
    }

    iteration++;

    if (iteration % 10000 === 0) {
      const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
      const rate = (iteration / ((Date.now() - startTime) / 1000)).toFixed(0);
      console.log(`[${elapsed}s] iteration=${iteration} rate=${rate}/s ops=${operations} failures=${failures.length}`);
    }
  }

  const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log('');
  console.log('=== Final Report ===');
  console.log(`Total iterations: ${iteration}`);
  console.log(`Elapsed: ${elapsed}s`);
  console.log(`Operations replayed: ${operations}`);
  console.log(`Failures: ${failures.length}`);

  if (failures.length > 0) {
    console.log('');
    for (const failure of failures) {
      const { data, start, end, ops } = failure.testCase;
      console.log(`  Seed: ${failure.seed}, Strategy: ${failure.strategy}`);
      console.log(`  Window: [${start}, ${end}) over ${data.length} bytes`);
      console.log(`  Ops: ${ops.map(formatOp).join(', ')}`);
      for (const violation of failure.violations) {
        console.log(`    ${violation}`);
      }
      console.log('');
    }
    process.exit(1);
  } else {
    console.log('\nNo issues found.');
    process.exit(0);
  }
}

main();
