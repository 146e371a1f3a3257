import type { KeyDecoder } from '@/types/completion';

const KEY_NAMES: Record<string, string> = {
  Enter: 'enter',
  Tab: 'tab',
  Escape: 'escape',
  Esc: 'escape',
  ArrowDown: 'down',
  ArrowUp: 'up',
  ArrowLeft: 'left',
  ArrowRight: 'right',
  PageDown: 'pagedown',
  PageUp: 'pageup',
  Home: 'home',
  End: 'end',
  Backspace: 'backspace',
  Delete: 'delete',
  ' ': 'space',
};

/**
 * Canonical names are lower case, modifiers first (`ctrl+alt+meta+shift+key`).
 * Shift is only spelled out for named keys; for printable characters it is
 * already part of `event.key`.
 */
export const decodeKey: KeyDecoder = (event) => {
  const name = KEY_NAMES[event.key] ?? event.key.toLowerCase();
  const parts: string[] = [];
  if (event.ctrlKey) parts.push('ctrl');
  if (event.altKey) parts.push('alt');
  if (event.metaKey) parts.push('meta');
  if (event.shiftKey && name.length > 1) parts.push('shift');
  parts.push(name);
  return parts.join('+');
};
