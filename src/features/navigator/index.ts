export { NO_KEY, resolveKeyAction, type KeyAction, type KeyPress } from './key-bindings';
export { Navigator, PAGE_SIZE, type NavigatorOptions, type NavigatorSnapshot } from './navigator';
export { useNavigator, type NavigatorView } from './use-navigator';
