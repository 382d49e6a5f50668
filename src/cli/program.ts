import { Argument, Command, InvalidArgumentError } from 'commander';
import { enableDefaultMetrics, metricsSummary } from '../metrics/index.js';
import { DEMO_MODES, runDemo, type DemoMode, type DemoOptions, type Output } from './demos.js';

function parseCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return n;
}

export function buildProgram(out: Output = (line) => console.log(line)): Command {
  const program = new Command();

  program
    .name('tierbus')
    .description('Prioritized in-process event bus demos')
    .version('0.1.0');

  program
    .command('demo')
    .description('Greet someone through one of the dispatch engines')
    .addArgument(new Argument('<mode>', 'dispatch engine').choices(DEMO_MODES))
    .option('--eventful', 'register listeners through an eventful Greeter', false)
    .option('--name <name>', 'who to greet', 'world')
    .option('--listeners <n>', 'listener count for threaded mode', parseCount, 5)
    .option('--delay <ms>', 'delay of the async greeting', parseCount, 100)
    .option('--metrics', 'print bus metrics afterwards', false)
    .action(async (mode: DemoMode, opts: DemoOptions & { metrics: boolean }) => {
      await runDemo(mode, opts, out);
      if (opts.metrics) {
        enableDefaultMetrics();
        out(await metricsSummary());
      }
    });

  return program;
}
