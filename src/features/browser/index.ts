export {
  DiskBrowser,
  directoryLine,
  footerLine,
  listRowsFor,
  titleLine,
  type DiskBrowserProps
} from './disk-browser';
export {
  BAR_WIDTH,
  entryRowText,
  formatEntryRow,
  formatSize,
  percentOf,
  renderBar,
  type EntryRow
} from './format';
export { HelpOverlay } from './help-overlay';
export { visibleWindow, type ListWindow } from './list-window';
export { theme } from './theme';
