import { Box, Text } from 'ink';

import { theme } from './theme';

const HELP_WIDTH = 42;
const KEY_COLUMN = 16;

const HELP_SECTIONS: ReadonlyArray<{ title: string; bindings: ReadonlyArray<[string, string]> }> = [
  {
    title: 'Navigation',
    bindings: [
      ['j / ↓', 'Move down 1 item'],
      ['k / ↑', 'Move up 1 item'],
      ['Ctrl+d / PgDn', 'Move down 10 items'],
      ['Ctrl+u / PgUp', 'Move up 10 items'],
      ['H / Home', 'Go to first item'],
      ['G / End', 'Go to last item']
    ]
  },
  {
    title: 'Actions',
    bindings: [
      ['o / l / Enter', 'Enter directory'],
      ['u / h / Bksp', 'Go up one level'],
      ['r', 'Refresh current view']
    ]
  },
  {
    title: 'Display',
    bindings: [
      ['s', 'Toggle sort by size'],
      ['m', 'Toggle sort by mtime'],
      ['c', 'Toggle sort by count']
    ]
  },
  {
    title: 'Other',
    bindings: [
      ['?', 'Toggle this help'],
      ['q / Esc', 'Quit']
    ]
  }
];

export function HelpOverlay({ width, height }: { width: number; height: number }) {
  return (
    <Box width={width} height={height} alignItems="center" justifyContent="center">
      <Box flexDirection="column" borderStyle="single" paddingX={1} width={Math.min(HELP_WIDTH, width)}>
        <Text color={theme.helpTitle} bold>
          dusk - disk usage browser
        </Text>
        {HELP_SECTIONS.map(({ title, bindings }) => (
          <Box key={title} flexDirection="column" marginTop={1}>
            <Text color={theme.helpHeader} bold>
              {title}:
            </Text>
            {bindings.map(([keys, description]) => (
              <Text key={keys}>{`  ${keys.padEnd(KEY_COLUMN)}${description}`}</Text>
            ))}
          </Box>
        ))}
        <Box marginTop={1}>
          <Text color={theme.helpHint}>Press any key to close</Text>
        </Box>
      </Box>
    </Box>
  );
}
