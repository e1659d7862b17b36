import { DiskBrowser, HelpOverlay } from '#features/browser';
import { useNavigator, type Navigator } from '#features/navigator';
import { useStdout } from 'ink';
import { useEffect, useState } from 'react';

const FALLBACK_SIZE = { width: 80, height: 24 };

function positiveOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) && value > 0 ? value : fallback;
}

// Ink repaints the whole screen once the output is as tall as the terminal.
function measure(stdout: NodeJS.WriteStream) {
  return {
    width: positiveOr(stdout.columns, FALLBACK_SIZE.width),
    height: positiveOr(stdout.rows, FALLBACK_SIZE.height) - 1
  };
}

function useTerminalSize() {
  const { stdout } = useStdout();
  const [size, setSize] = useState(() => measure(stdout));

  useEffect(() => {
    const onResize = () => {
      setSize(measure(stdout));
    };
    stdout.on('resize', onResize);
    return () => {
      stdout.off('resize', onResize);
    };
  }, [stdout]);

  return size;
}

function App({ navigator, version }: { navigator: Navigator; version: string }) {
  const { snapshot, helpVisible } = useNavigator(navigator);
  const { width, height } = useTerminalSize();

  if (helpVisible) {
    return <HelpOverlay width={width} height={height} />;
  }

  return <DiskBrowser snapshot={snapshot} version={version} width={width} height={height} />;
}

export default App;
