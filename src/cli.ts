import { Command } from 'commander'
import type { INestApplicationContext } from '@nestjs/common'
import { JobsCommand } from './commands/jobs/jobs.command'
import { TailorCommand } from './commands/tailor/tailor.command'

/**
 * Command-line surface. Each action hands the merged global and command
 * options to its command class, which validates them.
 */
export function buildProgram(app: INestApplicationContext): Command {
  const jobsCommand = app.get(JobsCommand)
  const tailorCommand = app.get(TailorCommand)

  const program = new Command()
  program
    .name('job-tailor')
    .description('Match job postings against your profile and write tailored resumes')
    .option('--jobs <path>', 'job postings CSV (default: $JOBS_CSV_PATH)')
    .option('--profile <path>', 'profile JSON or YAML (default: $PROFILE_PATH)')

  program
    .command('filter')
    .description('List postings matching location and keyword rules')
    .option('--locations <list>', 'semicolon-separated location substrings')
    .option('--include <list>', 'comma-separated terms; title or description must contain one')
    .option('--exclude <list>', 'comma-separated terms; title and description must contain none')
    .action(async (_options: unknown, command: Command) => {
      await jobsCommand.filter(command.optsWithGlobals())
    })

  program
    .command('tailor')
    .description('Write a tailored resume and cover letter for one posting')
    .requiredOption('--job-id <id>', 'posting id')
    .option('--out-dir <dir>', 'output directory (default: $OUTPUT_DIR)')
    .option('--docx', 'also write a .docx resume', false)
    .option('--per-group-cap <n>', 'bullets kept per experience before merging')
    .option('--global-cap <n>', 'bullets kept overall')
    .action(async (_options: unknown, command: Command) => {
      await tailorCommand.tailor(command.optsWithGlobals())
    })

  program
    .command('open')
    .description("Open a posting's apply URL in the default browser")
    .requiredOption('--job-id <id>', 'posting id')
    .action(async (_options: unknown, command: Command) => {
      await jobsCommand.open(command.optsWithGlobals())
    })

  program
    .command('keywords')
    .description('Show the ranked keywords extracted from a posting')
    .requiredOption('--job-id <id>', 'posting id')
    .option('--top-k <n>', 'number of keywords to show')
    .action(async (_options: unknown, command: Command) => {
      await jobsCommand.keywords(command.optsWithGlobals())
    })

  return program
}
