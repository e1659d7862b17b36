export const theme = Object.freeze({
  headerBg: '#dedede',
  headerFg: '#000000',
  dirInfo: '#00ffff',
  size: '#4e9a06',
  percent: '#ffffff',
  directory: '#00dcff',
  file: '#dcdcdc',
  helpTitle: '#00ffff',
  helpHeader: '#ffdc00',
  helpHint: '#808080',
  highlightBg: '#ffffff',
  highlightFg: '#282828'
});
