#!/usr/bin/env tsx
import { Command } from 'commander'
import { recordsCommand } from '@/commands/records'
import { unpackCommand } from '@/commands/unpack'
import { validateCommand } from '@/commands/validate'

const program = new Command()

program.name('ihex-image').description('Unpack Intel HEX files into binary images').version('0.1.0')

// ihex-image unpack <file> --size <n>
program
  .command('unpack <file>')
  .description('Unpack records into an image of the given size')
  .requiredOption('--size <n>', 'Image size in bytes (decimal, 0x hex, or k/M suffix)')
  .option('--base-offset <n>', 'Absolute address of the first image byte', '0')
  .option('-o, --output <path>', 'Write the image to a file')
  .option('--pretty', 'Pretty-print JSON output')
  .option('--verbose', 'Trace each record to stderr')
  .action(
    async (
      file: string,
      options: { size: string; baseOffset?: string; output?: string; pretty?: boolean; verbose?: boolean },
    ) => {
      await unpackCommand(file, options)
    },
  )

// ihex-image records <file>
program
  .command('records <file>')
  .description('List decoded records')
  .option('--pretty', 'Pretty-print JSON output')
  .action(async (file: string, options: { pretty?: boolean }) => {
    await recordsCommand(file, options)
  })

// ihex-image validate <file>
program
  .command('validate <file>')
  .description('Check records, end-of-file and overlapping data')
  .option('--pretty', 'Pretty-print JSON output')
  .action(async (file: string, options: { pretty?: boolean }) => {
    await validateCommand(file, options)
  })

await program.parseAsync(process.argv)
