import fs from 'fs-extra';
import path from 'path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { createStyledRenderer } from '../pipeline/render';
import { documentFromText } from '../pipeline/markup';
import { closeLogFile, setLogFile, setLogLevel } from '../pipeline/log';

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option('in', { type: 'string', default: 'input.txt' })
    .option('out', { type: 'string', default: 'professional_summary.pdf' })
    .option('log-file', { type: 'string' })
    .option('verbose', { type: 'boolean', default: false })
    .parse();

  if (argv['log-file']) setLogFile(argv['log-file']);
  if (argv.verbose) setLogLevel('debug');

  const inPath = path.resolve(argv.in);
  if (!(await fs.pathExists(inPath))) {
    console.error(`Input file not found: ${inPath}`);
    process.exitCode = 1;
    return;
  }

  const text = await fs.readFile(inPath, 'utf8');
  const bytes = await createStyledRenderer().render([documentFromText(text)]);
  const outPath = path.resolve(argv.out);
  await fs.outputFile(outPath, bytes);
  console.log('PDF:', outPath);
}

main()
  .catch((e) => {
    console.error(e);
    process.exitCode = 1;
  })
  .finally(closeLogFile);
