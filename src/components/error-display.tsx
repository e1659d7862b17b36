import { Box, Text, useApp, useInput } from 'ink';

interface ErrorDisplayProps {
  title: string;
  error: Error;
  onRetry?: () => void;
}

export function ErrorDisplay({ title, error, onRetry }: ErrorDisplayProps) {
  const { exit } = useApp();

  useInput((input, key) => {
    if (onRetry && input === 'r') {
      onRetry();
      return;
    }
    if (input === 'q' || key.escape) exit(error);
  });

  return (
    <Box flexDirection="column" padding={1}>
      <Text color="red" bold>
        {title}
      </Text>
      <Box marginY={1} borderStyle="round" paddingX={1}>
        <Text>{error.message}</Text>
      </Box>
      <Text dimColor>{onRetry ? 'Press r to retry or q to quit' : 'Press q to quit'}</Text>
    </Box>
  );
}
