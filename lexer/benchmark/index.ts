import { adapters } from './adapters.js';
import { generateDatasets } from './datasets.js';
import { formatSummary, parseBenchmarkArgs, runBenchmarkSuite, saveResults } from './runner.js';

// Entrypoint: npm run bench -- [--only-parser=<name>] [--only-dataset=<name>] [--iterations=<n>] [--save]
function main(argv: string[]): void {
  const args = parseBenchmarkArgs(argv);

  const runAdapters = args.onlyParser ? adapters.filter(a => a.name === args.onlyParser) : adapters;
  const runDatasets = generateDatasets().filter(d => !args.onlyDataset || d.name === args.onlyDataset);
  if (!runAdapters.length) throw new Error('Benchmark: unknown parser ' + args.onlyParser);
  if (!runDatasets.length) throw new Error('Benchmark: unknown dataset ' + args.onlyDataset);

  console.log(`Parsers: ${runAdapters.map(a => a.name).join(', ')}`);
  const results = runBenchmarkSuite({ adapters: runAdapters, datasets: runDatasets, iterations: args.iterations });

  console.log('\n=== BENCHMARK SUMMARY ===\n');
  console.log(formatSummary(results));

  if (args.save)
    console.log(`\nResults saved to: ${saveResults(results)}`);
}

try {
  main(process.argv.slice(2));
} catch (err) {
  console.error(err);
  process.exit(1);
}
