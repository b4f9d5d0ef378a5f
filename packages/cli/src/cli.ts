import { Command } from 'commander'
import { createRequire } from 'node:module'
import { runProbeCommand, type ProbeCommandOptions } from './commands/probe.js'
import { renderError, renderProbeResult } from './output/render.js'

const require = createRequire(import.meta.url)

type CliPackageJson = {
  version?: unknown
}

function resolveCliVersion(): string {
  try {
    const packageJson: CliPackageJson = require('../package.json')
    if (typeof packageJson.version === 'string' && packageJson.version.trim().length > 0) {
      return packageJson.version.trim()
    }
  } catch {
    return 'unknown'
  }
  return 'unknown'
}

export function createCli(): Command {
  const program = new Command()

  program
    .name('stunwire')
    .description('Send STUN-style requests and watch how their transactions resolve')
    .version(resolveCliVersion(), '-v, --version', 'output the version number')

  program
    .command('probe')
    .description('Send a Binding request and report the response or timeout')
    .argument('<address>', 'Server address as host:port')
    .option('-n, --network <network>', 'tcp | tcp4 | tcp6 | udp | udp4 | udp6', 'udp')
    .option('-t, --timeout <ms>', 'Transaction timeout in milliseconds', '3000')
    .option('--json', 'Output in JSON format')
    .action(async (address: string, options: ProbeCommandOptions) => {
      const json = options.json === true
      try {
        const result = await runProbeCommand(address, options)
        process.stdout.write(`${renderProbeResult(result, { json })}\n`)
        if (result.outcome !== 'success') {
          process.exitCode = 1
        }
      } catch (error) {
        process.stderr.write(`${renderError(error, { json })}\n`)
        process.exitCode = 1
      }
    })

  return program
}
