#!/usr/bin/env node
import { CliOptions, formatSummary, parseCliArgs, run, USAGE } from './cli';
import { ConfigError, errorMessage } from './errors';

async function main(): Promise<number> {
  process.once('SIGINT', () => {
    console.log('\nExtraction cancelled by user');
    process.exit(0);
  });

  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    console.error('Use -h for help');
    return 1;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  console.log(`\nSize Chart Extractor\n`);

  try {
    const results = await run(options);
    console.log(`\nResults saved to ${options.output}\n`);
    console.log(formatSummary(results));
    return 0;
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Error: ${err.message}`);
      console.error('Use -h for help');
    } else {
      console.error(`\nExtraction failed: ${errorMessage(err)}`);
      if (options.debug && err instanceof Error) console.error(err.stack);
    }
    return 1;
  }
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error(`Unexpected error: ${errorMessage(err)}`);
    process.exit(1);
  },
);
