import type { Navigator, NavigatorSnapshot } from './navigator';

import { logger } from '#lib/logger';
import { useApp, useInput } from 'ink';
import { useCallback, useEffect, useRef, useState } from 'react';

import { resolveKeyAction, type KeyAction } from './key-bindings';

export interface NavigatorView {
  snapshot: NavigatorSnapshot;
  helpVisible: boolean;
  isRefreshing: boolean;
}

/**
 * Drives `navigator` from keyboard input and re-renders after every action.
 * Input other than quit is ignored while a refresh is running.
 */
export function useNavigator(navigator: Navigator): NavigatorView {
  const { exit } = useApp();
  const [snapshot, setSnapshot] = useState<NavigatorSnapshot>(() => navigator.snapshot());
  const [helpVisible, setHelpVisible] = useState(false);
  const [isRefreshing, setIsRefreshing] = useState(false);
  const mountedRef = useRef(true);

  useEffect(() => {
    mountedRef.current = true;
    return () => {
      mountedRef.current = false;
    };
  }, []);

  const sync = useCallback(() => {
    if (!mountedRef.current) return;
    setSnapshot(navigator.snapshot());
    setIsRefreshing(navigator.isRefreshing);
  }, [navigator]);

  const refresh = useCallback(() => {
    const pending = navigator.refresh();
    sync();
    pending
      .then(sync)
      .catch((error: unknown) => {
        logger.error('Refresh failed:', error);
        sync();
      });
  }, [navigator, sync]);

  const perform = (action: KeyAction): void => {
    switch (action) {
      case 'next':
        navigator.next();
        break;
      case 'previous':
        navigator.previous();
        break;
      case 'pageDown':
        navigator.pageDown();
        break;
      case 'pageUp':
        navigator.pageUp();
        break;
      case 'goToFirst':
        navigator.goToFirst();
        break;
      case 'goToLast':
        navigator.goToLast();
        break;
      case 'enter':
        navigator.enter();
        break;
      case 'goUp':
        navigator.goUp();
        break;
      case 'sortBySize':
        navigator.toggleSortBySize();
        break;
      case 'sortByModifiedTime':
        navigator.toggleSortByModifiedTime();
        break;
      case 'sortByItemCount':
        navigator.toggleSortByItemCount();
        break;
      case 'toggleHelp':
        setHelpVisible((visible) => !visible);
        break;
      case 'closeHelp':
        setHelpVisible(false);
        break;
      case 'refresh':
        refresh();
        return;
      case 'quit':
        exit();
        return;
      default:
        return action satisfies never;
    }
    sync();
  };

  useInput((input, key) => {
    const action = resolveKeyAction(input, key, helpVisible);
    if (navigator.isRefreshing && action !== 'quit') return;

    navigator.clearStatus();
    if (action === null) {
      sync();
      return;
    }
    perform(action);
  });

  return { snapshot, helpVisible, isRefreshing };
}
