import type { DiskNode } from '#features/disk-tree';
import type { NavigatorSnapshot } from '#features/navigator';

import { Box, Text } from 'ink';
import { useRef } from 'react';

import { COLUMN_SEPARATOR, entryRowText, formatEntryRow, formatSize } from './format';
import { visibleWindow } from './list-window';
import { theme } from './theme';

// Title, directory line, footer and the two list borders.
const CHROME_ROWS = 5;

export function listRowsFor(height: number): number {
  return Math.max(1, height - CHROME_ROWS);
}

function fitToWidth(text: string, width: number): string {
  return text.length >= width ? text.slice(0, width) : text.padEnd(width);
}

export function titleLine(version: string): string {
  return ` dusk v${version}    (press ? for help)`;
}

export function directoryLine(snapshot: NavigatorSnapshot): string {
  const line = ` ${snapshot.path} (${snapshot.itemCount} visible, ${formatSize(snapshot.size)})`;
  return snapshot.errorCount > 0 ? `${line}, ${snapshot.errorCount} errors` : line;
}

/** Sort and total on the left, the status message pushed to the right edge. */
export function footerLine(snapshot: NavigatorSnapshot, width: number): string {
  const order = snapshot.sortAscending ? 'ascending' : 'descending';
  const left = `Sort mode: ${snapshot.sortMode} ${order}  Total disk usage: ${formatSize(snapshot.size)}`;
  const right = snapshot.statusMessage ? `  ${snapshot.statusMessage}` : '';
  const padding = Math.max(0, width - left.length - right.length);
  return `${left}${' '.repeat(padding)}${right}`;
}

function TitleBar({ version, width }: { version: string; width: number }) {
  return (
    <Text color={theme.headerFg} backgroundColor={theme.headerBg} bold>
      {fitToWidth(titleLine(version), width)}
    </Text>
  );
}

function DirectoryInfo({ snapshot }: { snapshot: NavigatorSnapshot }) {
  return (
    <Text color={theme.dirInfo} wrap="truncate-end">
      {directoryLine(snapshot)}
    </Text>
  );
}

interface EntryLineProps {
  node: DiskNode;
  parentSize: number;
  selected: boolean;
}

function EntryLine({ node, parentSize, selected }: EntryLineProps) {
  const row = formatEntryRow(node, parentSize);

  if (selected) {
    return (
      <Text color={theme.highlightFg} backgroundColor={theme.highlightBg} wrap="truncate-end">
        {entryRowText(row)}
      </Text>
    );
  }

  return (
    <Text wrap="truncate-end">
      <Text color={theme.size}>{row.size}</Text>
      {COLUMN_SEPARATOR}
      <Text color={theme.percent}>{row.percent}</Text>
      {COLUMN_SEPARATOR}
      <Text color={theme.percent}>{row.bar}</Text>
      {COLUMN_SEPARATOR}
      <Text color={node.isDirectory ? theme.directory : theme.file}>{row.name}</Text>
    </Text>
  );
}

interface EntryListProps {
  snapshot: NavigatorSnapshot;
  rows: number;
  width: number;
}

function EntryList({ snapshot, rows, width }: EntryListProps) {
  const startRef = useRef(0);
  const range = visibleWindow(snapshot.itemCount, snapshot.selection, rows, startRef.current);
  startRef.current = range.start;

  return (
    <Box flexDirection="column" borderStyle="single" width={width} height={rows + 2}>
      {snapshot.children.slice(range.start, range.end).map((node, offset) => (
        <EntryLine
          key={node.path}
          node={node}
          parentSize={snapshot.size}
          selected={range.start + offset === snapshot.selection}
        />
      ))}
    </Box>
  );
}

function Footer({ snapshot, width }: { snapshot: NavigatorSnapshot; width: number }) {
  return (
    <Text color={theme.headerFg} backgroundColor={theme.headerBg} wrap="truncate-end">
      {footerLine(snapshot, width)}
    </Text>
  );
}

export interface DiskBrowserProps {
  snapshot: NavigatorSnapshot;
  version: string;
  width: number;
  height: number;
}

export function DiskBrowser({ snapshot, version, width, height }: DiskBrowserProps) {
  return (
    <Box flexDirection="column" width={width} height={height}>
      <TitleBar version={version} width={width} />
      <DirectoryInfo snapshot={snapshot} />
      <EntryList snapshot={snapshot} rows={listRowsFor(height)} width={width} />
      <Footer snapshot={snapshot} width={width} />
    </Box>
  );
}
