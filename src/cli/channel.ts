import fs from 'fs-extra';
import path from 'path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { FORMAT_IDS, isFormatId } from '../pipeline/formats';
import { closeLogFile, setLogFile, setLogLevel } from '../pipeline/log';
import type { UserMessage } from '../pipeline/report';
import { defaultDeps, runBatch, searchChannel, selectVideos } from '../pipeline/run';
import { createSession } from '../pipeline/session';
import type { RenderedDocument } from '../pipeline/types';
import { DEFAULT_MAX_VIDEOS } from '../pipeline/youtube';

const MARKS: Record<UserMessage['level'], string> = {
  success: '[ok]',
  info: '[..]',
  warning: '[!!]',
  error: '[xx]',
};

function printMessages(messages: readonly UserMessage[]) {
  for (const m of messages) {
    const line = `${MARKS[m.level]} ${m.text}`;
    if (m.level === 'error') console.error(line);
    else console.log(line);
  }
}

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option('channel', { type: 'string', demandOption: true })
    .option('format', { type: 'string', choices: FORMAT_IDS, default: 'original' })
    .option('max', { type: 'number', default: DEFAULT_MAX_VIDEOS })
    .option('select', {
      type: 'string',
      array: true,
      describe: 'Video ids or 1-based positions; all listed videos when omitted',
    })
    .option('out', { type: 'string', default: 'tubescribe_output.pdf' })
    .option('log-file', { type: 'string' })
    .option('verbose', { type: 'boolean', default: false })
    .parse();

  if (argv['log-file']) setLogFile(argv['log-file']);
  if (argv.verbose) setLogLevel('debug');
  const format = argv.format;
  if (!isFormatId(format)) {
    throw new Error(`Unknown format: ${format}`);
  }

  const deps = defaultDeps();
  const ctx = createSession();
  const videos = await searchChannel(ctx, deps, argv.channel, Math.max(1, argv.max));
  printMessages(ctx.messages);
  if (videos.length === 0) {
    process.exitCode = 1;
    return;
  }

  console.log(`Found ${videos.length} videos:`);
  videos.forEach((v, i) => console.log(`  ${String(i + 1).padStart(2)}. ${v.title} (${v.videoId})`));

  let selection = videos;
  if (argv.select && argv.select.length) {
    const { selected, unknown } = selectVideos(videos, argv.select);
    if (unknown.length) console.warn(`Ignoring unknown selection: ${unknown.join(', ')}`);
    selection = selected;
  }

  let doc: RenderedDocument | null = null;
  try {
    doc = await runBatch(ctx, deps, selection, format);
  } finally {
    printMessages(ctx.messages);
  }
  if (!doc) {
    process.exitCode = 1;
    return;
  }

  const outPath = path.resolve(argv.out);
  await fs.outputFile(outPath, doc.bytes);
  console.log('PDF:', outPath);
}

main()
  .catch((e) => {
    console.error(e);
    process.exitCode = 1;
  })
  .finally(closeLogFile);
