const ENTER_ALTERNATE_SCREEN = '\u001B[?1049h';
const LEAVE_ALTERNATE_SCREEN = '\u001B[?1049l';
const SHOW_CURSOR = '\u001B[?25h';

interface TerminalOutput {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

interface TerminalInput {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
}

/**
 * Owns the alternate screen for the lifetime of the UI. `restore` is safe to
 * call more than once, so crash handlers and normal shutdown can both use it.
 */
export class TerminalSession {
  private active = false;

  constructor(
    private readonly output: TerminalOutput,
    private readonly input: TerminalInput
  ) {}

  get isInteractive(): boolean {
    return this.input.isTTY === true && this.output.isTTY === true;
  }

  get isActive(): boolean {
    return this.active;
  }

  enter(): void {
    if (this.active) return;
    this.output.write(ENTER_ALTERNATE_SCREEN);
    this.active = true;
  }

  restore(): void {
    if (!this.active) return;
    this.active = false;
    if (this.input.isTTY === true) this.input.setRawMode?.(false);
    this.output.write(SHOW_CURSOR + LEAVE_ALTERNATE_SCREEN);
  }
}

/** Restores the terminal before reporting an error nothing else caught. */
export function createFatalHandler(
  session: TerminalSession,
  exit: (code: number) => void
): (error: unknown) => void {
  return (error) => {
    session.restore();
    console.error('Fatal error:', error);
    exit(1);
  };
}

export function installCrashHandlers(session: TerminalSession): () => void {
  const onFatal = createFatalHandler(session, (code) => process.exit(code));
  process.on('uncaughtException', onFatal);
  process.on('unhandledRejection', onFatal);
  return () => {
    process.off('uncaughtException', onFatal);
    process.off('unhandledRejection', onFatal);
  };
}
