import { mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { basename, extname, join } from 'node:path'
import type { Logger } from '@aws-lambda-powertools/logger'
import yargs from 'yargs'
import { z } from 'zod'
import { loadConfig } from './config'
import { InvalidConfigurationError } from './errors'
import { runPipeline } from './index'
import { logger as defaultLogger } from './logger'
import { parseWhisperResult, stitchChunks } from './steps/word-stream'
import type { TranscriptChunk } from './types'

const ChunkSecondsSchema = z.number().positive()

/**
 * Read and validate a recognizer JSON file.
 */
function readTranscript(path: string): TranscriptChunk['result'] {
  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'))
  } catch (err) {
    throw new InvalidConfigurationError(
      `Unable to read transcript ${path}: ${err instanceof Error ? err.message : String(err)}`,
    )
  }
  return parseWhisperResult(raw)
}

/**
 * Generate caption files from one or more recognizer JSON files.
 * Several files are treated as consecutive audio chunks of `--chunk-seconds` each.
 *
 * @param args - Command line arguments, without the node and script paths
 * @returns The paths of the written caption files
 */
export async function run(
  args: string[],
  logger: Logger = defaultLogger,
): Promise<string[]> {
  const argv = await yargs(args)
    .scriptName('cuesmith')
    .usage('$0 <transcript.json..> [options]')
    .option('config', {
      type: 'string',
      describe: 'JSON configuration file',
    })
    .option('mode', {
      type: 'string',
      describe: 'Caption granularity: word, line or segment',
    })
    .option('max-words', {
      type: 'number',
      describe: 'Maximum words per caption in line mode',
    })
    .option('max-chars', {
      type: 'number',
      describe: 'Maximum characters per caption in line mode',
    })
    .option('multiline', {
      type: 'boolean',
      describe: 'Allow captions on two lines',
    })
    .option('min-duration', {
      type: 'number',
      describe: 'Minimum caption display time in seconds',
    })
    .option('padding', {
      type: 'number',
      describe: 'Seconds added to the end of every caption',
    })
    .option('format', {
      type: 'string',
      describe: 'Output formats, comma separated or repeated: srt, vtt, json',
      // one value per flag, so transcript paths after it stay positional
      coerce: (value: string | string[]) =>
        [value].flat().flatMap((format) => format.split(',')),
    })
    .option('out-dir', {
      type: 'string',
      describe: 'Directory caption files are written to',
    })
    .option('chunk-seconds', {
      type: 'number',
      default: 30,
      describe: 'Duration of each chunk when several transcripts are given',
    })
    .demandCommand(1, 'At least one transcript file is required')
    .strictOptions()
    .fail((message, err) => {
      throw err ?? new InvalidConfigurationError(message)
    })
    .parseAsync()

  const config = loadConfig(argv.config, {
    captions: {
      mode: argv.mode,
      maxWords: argv['max-words'],
      maxChars: argv['max-chars'],
      multiline: argv.multiline,
      minDisplayDuration: argv['min-duration'],
      endPadding: argv.padding,
    },
    output: {
      formats: argv.format,
      outputDir: argv['out-dir'],
    },
  })

  const chunkSeconds = ChunkSecondsSchema.safeParse(argv['chunk-seconds'])
  if (!chunkSeconds.success) {
    throw new InvalidConfigurationError(
      `--chunk-seconds must be a positive number of seconds, got ${argv['chunk-seconds']}`,
      chunkSeconds.error.issues,
    )
  }

  const inputs = argv._.map(String)
  const chunks: TranscriptChunk[] = inputs.map((input) => ({
    result: readTranscript(input),
    duration: chunkSeconds.data,
  }))
  logger.info('Loaded transcripts', { inputs, chunks: chunks.length })

  const result =
    chunks.length === 1 ? chunks[0].result : stitchChunks(chunks)
  const { outputs } = runPipeline(result, config, { logger })

  const outputDir = config.output.outputDir
  mkdirSync(outputDir, { recursive: true })
  const baseName = basename(inputs[0], extname(inputs[0]))

  const written: string[] = []
  for (const format of config.output.formats) {
    const content = outputs[format]
    if (content === undefined) {
      continue
    }
    const outputPath = join(outputDir, `${baseName}.${format}`)
    writeFileSync(outputPath, content, 'utf-8')
    written.push(outputPath)
    logger.info('Caption file saved', { format, path: outputPath })
  }

  return written
}
