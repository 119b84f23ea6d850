import { t } from '../theme.js'

/**
 * renderHelp — print the shell commands.
 */
export function renderHelp(): void {
  const cmd = (name: string, desc: string) => {
    const pad = ' '.repeat(Math.max(1, 18 - name.length))
    return '  ' + t.white(name) + t.dim(pad + desc) + '\n'
  }

  let out = '\n  ' + t.dim('─── ') + t.blue('commands') + '\n'
  out += cmd('start',       'launch the kernel (start_kernel)')
  out += cmd('log [n]',     'show the last n launches (default 10)')
  out += cmd('help',        'show this help')
  out += cmd('exit  Ctrl+C', 'leave the shell; running kernels keep running')

  process.stdout.write(out)
}
