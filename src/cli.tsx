import { assertScannableRoot, ConfigError, resolveConfig, type CliOptions } from '#core/config';
import { installCrashHandlers, TerminalSession } from '#core/terminal';
import { createFsEntrySource } from '#features/scanner';
import { setLogLevel } from '#lib/logger';
import { render } from 'ink';
import { readFile } from 'node:fs/promises';

import AppLoader from './app-loader';
import { createProgram } from './program';

async function readVersion(): Promise<string> {
  const manifest: unknown = JSON.parse(
    await readFile(new URL('../package.json', import.meta.url), 'utf8')
  );
  if (
    typeof manifest === 'object' &&
    manifest !== null &&
    'version' in manifest &&
    typeof manifest.version === 'string'
  ) {
    return manifest.version;
  }
  return '0.0.0';
}

async function run(version: string, pathArg: string, options: CliOptions): Promise<void> {
  const config = resolveConfig(pathArg, options);
  setLogLevel(config.logLevel);
  await assertScannableRoot(config.rootPath);

  const session = new TerminalSession(process.stdout, process.stdin);
  if (!session.isInteractive) {
    throw new ConfigError('dusk needs an interactive terminal');
  }

  const uninstallCrashHandlers = installCrashHandlers(session);
  session.enter();
  try {
    const instance = render(
      <AppLoader config={config} entrySource={createFsEntrySource()} version={version} />
    );
    await instance.waitUntilExit();
  } finally {
    session.restore();
    uninstallCrashHandlers();
  }
}

async function main(): Promise<void> {
  const version = await readVersion();
  const program = createProgram({
    version,
    run: async (pathArg, options) => run(version, pathArg, options)
  });
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? `dusk: ${error.message}` : error);
  process.exitCode = 1;
});
