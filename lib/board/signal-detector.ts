import type { Platform, SignalDetails, SignalMatch } from './types';

export interface SignalDetectorConfig {
  signal: string;
  caseSensitive: boolean;
}

const PLATFORM_ALIASES: Record<string, Platform> = {
  pc: 'pc',
  xb: 'xb',
  xbox: 'xb',
  xb1: 'xb',
  ps: 'ps',
  ps4: 'ps',
  ps5: 'ps',
  playstation: 'ps',
};

export function parsePlatform(value: string): Platform | undefined {
  return PLATFORM_ALIASES[value.trim().toLowerCase().replace(/\s+/g, '')];
}

/**
 * Pull the optional fields out of the conventional signal layout:
 * `RATSIGNAL - CMDR Nova - System: Sol - Platform: PC - O2: OK - Language: English`
 * Unknown segments are ignored.
 */
export function parseSignalDetails(text: string): SignalDetails {
  const details: SignalDetails = {};

  for (const segment of text.split(/\s+-\s+/)) {
    const cmdr = /^cmdr\s+(.+)$/i.exec(segment.trim());
    if (cmdr) {
      details.client = cmdr[1].trim();
      continue;
    }

    const field = /^([a-z0-9 ]+?)\s*:\s*(.*)$/i.exec(segment.trim());
    if (!field) continue;
    const key = field[1].toLowerCase();
    const value = field[2].trim();
    if (!value) continue;

    switch (key) {
      case 'system':
        details.system = value;
        break;
      case 'platform': {
        const platform = parsePlatform(value);
        if (platform) details.platform = platform;
        break;
      }
      case 'o2':
        details.codeRed = /not\s*ok/i.test(value);
        break;
      case 'language':
        details.language = value;
        break;
    }
  }

  return details;
}

export class SignalDetector {
  private trigger: string;
  private caseSensitive: boolean;

  constructor(config: SignalDetectorConfig) {
    this.caseSensitive = config.caseSensitive;
    this.trigger = config.caseSensitive ? config.signal : config.signal.toLowerCase();
  }

  /**
   * Returns a match when the trigger appears anywhere in `line` and the line
   * is not a bot command. Empty or absent input is simply no match.
   */
  detect(
    line: string | null | undefined,
    sender: string,
    commandPrefix: string | readonly string[],
    channel = '',
  ): SignalMatch | null {
    if (!line || !line.trim() || !this.trigger) return null;

    const prefixes = typeof commandPrefix === 'string' ? [commandPrefix] : commandPrefix;
    const trimmed = line.trimStart();
    if (prefixes.some((prefix) => prefix.length > 0 && trimmed.startsWith(prefix))) {
      return null;
    }

    const haystack = this.caseSensitive ? line : line.toLowerCase();
    if (!haystack.includes(this.trigger)) return null;

    return {
      text: line.trim(),
      reporter: sender,
      channel,
      timestamp: Date.now(),
      details: parseSignalDetails(line),
    };
  }
}
