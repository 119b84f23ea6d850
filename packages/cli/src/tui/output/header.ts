import { t } from '../theme.js'

/**
 * renderHeader — print the startup banner: wordmark, separator, and the
 * command line every `start` will run.
 */
export function renderHeader(home: string, argv: ReadonlyArray<string>): void {
  process.stdout.write('\n')
  process.stdout.write('  ' + t.blue.bold('L O O P D E S K') + '   ' + t.muted('kernel launcher') + '\n')
  process.stdout.write('  ' + t.dim('─'.repeat(60)) + '\n')
  process.stdout.write('  ' + t.muted('home  ') + '  ' + t.text(home) + '\n')
  process.stdout.write('  ' + t.muted('kernel') + '  ' + t.text(argv.join(' ')) + '\n')
  process.stdout.write('\n')
  process.stdout.write('  ' + t.dim("type 'start' to launch, 'help' for commands") + '\n')
}
