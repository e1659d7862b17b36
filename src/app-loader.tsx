import type { AppConfig } from '#core/config';
import type { EntrySource } from '#features/scanner';
import type { ErrorInfo, ReactNode } from 'react';

import { buildTree, countDescendants } from '#features/disk-tree';
import { Navigator } from '#features/navigator';
import { logger } from '#lib/logger';
import { Box, Text } from 'ink';
import { Component, useCallback, useEffect, useRef, useState } from 'react';

import App from './app';
import { ErrorDisplay } from './components/error-display';

interface ErrorBoundaryProps {
  children: ReactNode;
}

interface ErrorBoundaryState {
  hasError: boolean;
  error?: Error;
}

export class ErrorBoundary extends Component<ErrorBoundaryProps, ErrorBoundaryState> {
  constructor(props: ErrorBoundaryProps) {
    super(props);
    this.state = { hasError: false };
  }

  static getDerivedStateFromError(error: Error): ErrorBoundaryState {
    return { hasError: true, error };
  }

  override componentDidCatch(error: Error, errorInfo: ErrorInfo) {
    logger.error('Render failed:', error);
    logger.error('Component stack:', errorInfo.componentStack);
  }

  override render() {
    if (this.state.hasError) {
      return (
        <ErrorDisplay
          title="Something went wrong"
          error={this.state.error ?? new Error('Unknown error')}
        />
      );
    }
    return this.props.children;
  }
}

function LoadingScreen({ rootPath }: { rootPath: string }) {
  return (
    <Box padding={1}>
      <Text>Scanning {rootPath}... This may take a moment.</Text>
    </Box>
  );
}

type LoadState =
  | { status: 'loading' }
  | { status: 'error'; error: Error }
  | { status: 'ready'; navigator: Navigator };

interface AppLoaderProps {
  config: AppConfig;
  entrySource: EntrySource;
  version: string;
}

function AppLoader({ config, entrySource, version }: AppLoaderProps) {
  const [state, setState] = useState<LoadState>({ status: 'loading' });
  const mountedRef = useRef(true);

  const scan = useCallback(() => {
    setState({ status: 'loading' });
    const started = performance.now();

    buildTree(config.rootPath, config.scan, entrySource)
      .then((root) => {
        const { files, directories } = countDescendants(root);
        const elapsed = Math.round(performance.now() - started);
        logger.debug(`Scanned ${files} files in ${directories} directories in ${elapsed} ms`);
        if (!mountedRef.current) return;
        const navigator = new Navigator(root, {
          scanOptions: config.scan,
          entrySource,
          propagateRefreshToAncestors: config.propagateRefreshToAncestors
        });
        setState({ status: 'ready', navigator });
        return;
      })
      .catch((e: unknown) => {
        const error = e instanceof Error ? e : new Error(String(e));
        logger.error(`Failed to scan ${config.rootPath}:`, error);
        if (mountedRef.current) setState({ status: 'error', error });
      });
  }, [config, entrySource]);

  useEffect(() => {
    mountedRef.current = true;
    scan();
    return () => {
      mountedRef.current = false;
    };
  }, [scan]);

  switch (state.status) {
    case 'loading':
      return <LoadingScreen rootPath={config.rootPath} />;
    case 'error':
      return <ErrorDisplay title="Failed to scan" error={state.error} onRetry={scan} />;
    case 'ready':
      return (
        <ErrorBoundary>
          <App navigator={state.navigator} version={version} />
        </ErrorBoundary>
      );
  }
}

export default AppLoader;
