/**
 * Hotkey definitions and accelerator parsing for hotscribe
 *
 * Bindings are written in accelerator form ("F9", "Ctrl+Shift+F9",
 * "CmdOrCtrl+Alt+R") and parsed into the key names reported by
 * node-global-key-listener. Display helpers convert them to
 * platform-appropriate labels.
 */

import type { IGlobalKey, IGlobalKeyEvent } from 'node-global-key-listener';
import type { HotkeyAction, HotkeyConfig } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface HotkeyDefinition {
  id: HotkeyAction;
  label: string;
  description: string;
  defaultAccelerator: string;
}

/**
 * The parts of a listener event that matching looks at
 */
export type KeyEvent = Pick<IGlobalKeyEvent, 'name' | 'state'>;

export type KeysDown = Partial<Record<IGlobalKey, boolean>>;

export interface ParsedHotkey {
  source: string;
  triggerKey: IGlobalKey;
  /** Each group is satisfied when any one of its keys is down */
  requiredModifierGroups: IGlobalKey[][];
}

// ============================================================================
// Platform Detection
// ============================================================================

export function isMacOS(): boolean {
  return process.platform === 'darwin';
}

export function isWindows(): boolean {
  return process.platform === 'win32';
}

// ============================================================================
// Hotkey Definitions
// ============================================================================

export const HOTKEYS: HotkeyDefinition[] = [
  {
    id: 'toggleRecording',
    label: 'Toggle Recording',
    description: 'Start or stop a microphone recording',
    defaultAccelerator: 'F9',
  },
  {
    id: 'resetPipeline',
    label: 'Reset',
    description: 'Abandon the current transcription and return to idle',
    defaultAccelerator: 'Ctrl+Shift+F9',
  },
  {
    id: 'exit',
    label: 'Exit',
    description: 'Stop listening and quit hotscribe',
    defaultAccelerator: 'Escape',
  },
];

export const DEFAULT_HOTKEY_CONFIG: HotkeyConfig = {
  toggleRecording: 'F9',
  resetPipeline: 'Ctrl+Shift+F9',
  exit: 'Escape',
};

// ============================================================================
// Key Tables
// ============================================================================

const MODIFIER_ALIASES: Record<string, IGlobalKey[]> = {
  command: ['LEFT META', 'RIGHT META'],
  cmd: ['LEFT META', 'RIGHT META'],
  meta: ['LEFT META', 'RIGHT META'],
  super: ['LEFT META', 'RIGHT META'],
  control: ['LEFT CTRL', 'RIGHT CTRL'],
  ctrl: ['LEFT CTRL', 'RIGHT CTRL'],
  shift: ['LEFT SHIFT', 'RIGHT SHIFT'],
  alt: ['LEFT ALT', 'RIGHT ALT'],
  option: ['LEFT ALT', 'RIGHT ALT'],
  commandorcontrol: ['LEFT META', 'RIGHT META', 'LEFT CTRL', 'RIGHT CTRL'],
  cmdorctrl: ['LEFT META', 'RIGHT META', 'LEFT CTRL', 'RIGHT CTRL'],
};

const ALL_MODIFIER_KEYS: IGlobalKey[] = [
  'LEFT META',
  'RIGHT META',
  'LEFT CTRL',
  'RIGHT CTRL',
  'LEFT SHIFT',
  'RIGHT SHIFT',
  'LEFT ALT',
  'RIGHT ALT',
];

const SPECIAL_KEY_ALIASES: Record<string, IGlobalKey> = {
  space: 'SPACE',
  enter: 'RETURN',
  return: 'RETURN',
  tab: 'TAB',
  escape: 'ESCAPE',
  esc: 'ESCAPE',
  backspace: 'BACKSPACE',
  delete: 'DELETE',
  home: 'HOME',
  end: 'END',
};

const MAIN_KEYS: readonly IGlobalKey[] = [
  'A', 'B', 'C', 'D', 'E', 'F', 'G', 'H', 'I', 'J', 'K', 'L', 'M',
  'N', 'O', 'P', 'Q', 'R', 'S', 'T', 'U', 'V', 'W', 'X', 'Y', 'Z',
  '0', '1', '2', '3', '4', '5', '6', '7', '8', '9',
  'F1', 'F2', 'F3', 'F4', 'F5', 'F6', 'F7', 'F8', 'F9', 'F10', 'F11', 'F12',
  'F13', 'F14', 'F15', 'F16', 'F17', 'F18', 'F19', 'F20', 'F21', 'F22', 'F23', 'F24',
];

/**
 * macOS key display names
 */
const MAC_NAMES: Record<string, string> = {
  command: 'Cmd',
  cmd: 'Cmd',
  meta: 'Cmd',
  super: 'Cmd',
  commandorcontrol: 'Cmd',
  cmdorctrl: 'Cmd',
  control: 'Ctrl',
  ctrl: 'Ctrl',
  option: 'Option',
  alt: 'Option',
  shift: 'Shift',
  enter: 'Return',
  return: 'Return',
  escape: 'Esc',
  esc: 'Esc',
  backspace: 'Delete',
  space: 'Space',
  tab: 'Tab',
};

/**
 * Windows/Linux key display names
 */
const WIN_LINUX_NAMES: Record<string, string> = {
  command: 'Win',
  cmd: 'Win',
  meta: 'Win',
  super: 'Super',
  commandorcontrol: 'Ctrl',
  cmdorctrl: 'Ctrl',
  control: 'Ctrl',
  ctrl: 'Ctrl',
  option: 'Alt',
  alt: 'Alt',
  shift: 'Shift',
  enter: 'Enter',
  return: 'Enter',
  escape: 'Esc',
  esc: 'Esc',
  backspace: 'Backspace',
  space: 'Space',
  tab: 'Tab',
};

// ============================================================================
// Parsing
// ============================================================================

function normalizeMainKeyToken(token: string): IGlobalKey | undefined {
  const upper = token.trim().toUpperCase();
  return MAIN_KEYS.find((key) => key === upper);
}

/**
 * Parse an accelerator into a trigger key plus required modifier groups.
 * Unlike push-to-talk bindings, a bare key ("F9", "Escape") is allowed.
 */
export function parseHotkey(accelerator: string): ParsedHotkey {
  const tokens = accelerator
    .split('+')
    .map((token) => token.trim())
    .filter(Boolean);

  if (tokens.length === 0) {
    throw new Error('Hotkey is empty');
  }

  const modifierGroups: IGlobalKey[][] = [];
  let trigger: IGlobalKey | undefined;

  for (const token of tokens) {
    const normalized = token.toLowerCase();
    const modifierGroup = MODIFIER_ALIASES[normalized];
    if (modifierGroup) {
      modifierGroups.push(modifierGroup);
      continue;
    }

    const candidate = SPECIAL_KEY_ALIASES[normalized] ?? normalizeMainKeyToken(token);
    if (!candidate) {
      throw new Error(`Unsupported hotkey token '${token}' in ${accelerator}`);
    }

    if (trigger) {
      throw new Error(`Hotkey must define exactly one non-modifier key: ${accelerator}`);
    }

    trigger = candidate;
  }

  if (!trigger) {
    throw new Error(`Hotkey missing a trigger key: ${accelerator}`);
  }

  return {
    source: accelerator,
    triggerKey: trigger,
    requiredModifierGroups: modifierGroups,
  };
}

export function isValidHotkey(accelerator: string): boolean {
  try {
    parseHotkey(accelerator);
    return true;
  } catch {
    return false;
  }
}

// ============================================================================
// Matching
// ============================================================================

/**
 * True when the event is the key-down of the trigger with exactly the
 * required modifiers held. Extra modifiers prevent a match, so "F9" does
 * not fire while "Ctrl+Shift+F9" is being pressed.
 */
export function matchesHotkey(
  hotkey: ParsedHotkey,
  event: KeyEvent,
  down: KeysDown
): boolean {
  if (event.state !== 'DOWN' || event.name !== hotkey.triggerKey) {
    return false;
  }

  const required = hotkey.requiredModifierGroups;
  if (!required.every((group) => group.some((key) => down[key]))) {
    return false;
  }

  const allowed = new Set(required.flat());
  return ALL_MODIFIER_KEYS.every((key) => allowed.has(key) || !down[key]);
}

// ============================================================================
// Display
// ============================================================================

/**
 * Format an accelerator for display, e.g. "Ctrl+Shift+F9" or "Esc"
 */
export function formatHotkeyForDisplay(accelerator: string): string {
  const names = isMacOS() ? MAC_NAMES : WIN_LINUX_NAMES;

  return accelerator
    .split('+')
    .map((key) => key.trim())
    .filter(Boolean)
    .map((key) => names[key.toLowerCase()] ?? key.toUpperCase())
    .join('+');
}
