/**
 * @module commands/serve
 * `specmock serve [spec]`: start the mock server.
 *
 * Settings come from `specmock.yaml` (or `--config`), overridden by flags;
 * a positional spec overrides the file's `spec`.
 */

import { Command } from 'commander';
import path from 'node:path';
import {
  ConfigFileError,
  MockServerConfigSchema,
  findConfigFile,
  loadConfig,
  startMockServer,
  type MockServerConfig,
  type RunningMockServer,
} from 'specmock-core';

const GREEN = '\x1b[32m';
const RED = '\x1b[31m';
const GRAY = '\x1b[90m';
const BOLD = '\x1b[1m';
const RESET = '\x1b[0m';

export interface ServeOptions {
  config?: string;
  port?: string;
  host?: string;
  logLevel?: string;
  /** `false` only when --no-diagnostics was given */
  diagnostics: boolean;
}

/**
 * Merge the configuration file (if any) with command-line flags.
 *
 * @throws ConfigFileError when no contract is given anywhere or the merged
 *   settings are invalid
 */
export async function resolveServeConfig(
  specArg: string | undefined,
  opts: ServeOptions,
  cwd: string = process.cwd(),
): Promise<MockServerConfig> {
  const configPath = opts.config ? path.resolve(cwd, opts.config) : await findConfigFile(cwd);
  const fromFile = configPath ? await loadConfig(configPath) : undefined;

  const spec = specArg ? path.resolve(cwd, specArg) : fromFile?.spec;
  if (!spec) {
    throw new ConfigFileError(
      'CONFIG_NOT_FOUND',
      'No contract given: pass `specmock serve <spec>` or create specmock.yaml',
    );
  }

  const result = MockServerConfigSchema.safeParse({
    spec,
    port: opts.port ?? fromFile?.port,
    host: opts.host ?? fromFile?.host,
    logLevel: opts.logLevel ?? fromFile?.logLevel,
    diagnostics: opts.diagnostics === false ? false : fromFile?.diagnostics,
  });
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigFileError('CONFIG_INVALID', `Invalid options:\n${issues.join('\n')}`, { issues });
  }
  return result.data;
}

export function registerServe(program: Command): void {
  program
    .command('serve')
    .description('Start a mock server for an OpenAPI contract')
    .argument('[spec]', 'OpenAPI contract file (YAML or JSON)')
    .option('-c, --config <path>', 'specmock.yaml configuration file')
    .option('-p, --port <port>', 'Port to listen on (0 picks a free one)')
    .option('-H, --host <host>', 'Interface to bind')
    .option('--log-level <level>', 'fatal | error | warn | info | debug | trace | silent')
    .option('--no-diagnostics', 'Do not expose /_mock/health and /_mock/routes')
    .action(async (spec: string | undefined, opts: ServeOptions) => {
      let running: RunningMockServer;
      try {
        running = await startMockServer(await resolveServeConfig(spec, opts));
      } catch (err) {
        console.error(`${RED}${err instanceof Error ? err.message : String(err)}${RESET}`);
        process.exitCode = 1;
        return;
      }

      console.log(`\n${BOLD}specmock${RESET} ${running.contract.title}\n`);
      console.log(`  ${GREEN}Listening${RESET} → ${running.url}`);
      console.log(`  ${GRAY}Contract: ${running.contract.specPath}${RESET}\n`);

      const shutdown = () => {
        console.log('\nShutting down...');
        void running.close().catch((err: unknown) => {
          console.error(`${RED}Shutdown failed: ${err instanceof Error ? err.message : String(err)}${RESET}`);
          process.exitCode = 1;
        });
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    });
}
