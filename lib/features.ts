import type { CaseRegistry } from './board/case-registry';
import { RatBoardFeature } from './board/feature';
import { HelpFeature } from './help';
import type { BotConfig, FeatureName } from './config/schema';

export interface ParsedCommand {
  name: string;
  args: string[];
  /** Everything after the command name, whitespace preserved */
  rest: string;
}

export interface ChatEvent {
  channel: string;
  sender: string;
  text: string;
  isCommand: boolean;
  command?: ParsedCommand;
}

export interface CommandHelp {
  usage: string;
  description: string;
}

/**
 * A unit of bot behaviour. Every enabled feature sees every message and
 * answers with zero or more lines for the channel it came from.
 */
export interface ChatFeature {
  readonly name: FeatureName;
  readonly commands: readonly CommandHelp[];
  handle(event: ChatEvent): Promise<string[]>;
}

export interface FeatureContext {
  config: BotConfig;
  registry: CaseRegistry;
  /** Features enabled alongside this one, available once all are built */
  features: () => readonly ChatFeature[];
}

export type FeatureFactory = (context: FeatureContext) => ChatFeature;

export const featureTable: Record<FeatureName, FeatureFactory> = {
  'rat-board': (context) => new RatBoardFeature(context.registry, context.config),
  help: (context) => new HelpFeature(context.config, context.features),
};

export function createFeatures(
  names: readonly FeatureName[],
  context: Omit<FeatureContext, 'features'>,
): ChatFeature[] {
  const features: ChatFeature[] = [];
  const full: FeatureContext = { ...context, features: () => features };
  for (const name of new Set(names)) {
    features.push(featureTable[name](full));
  }
  return features;
}

/**
 * Split a line into a command when it starts with one of the prefixes.
 */
export function parseCommand(text: string, prefixes: readonly string[]): ParsedCommand | undefined {
  const trimmed = text.trim();
  const prefix = prefixes
    .filter((candidate) => candidate.length > 0 && trimmed.startsWith(candidate))
    .sort((a, b) => b.length - a.length)[0];
  if (prefix === undefined) return undefined;

  const body = trimmed.slice(prefix.length);
  const match = /^(\S+)\s*(.*)$/s.exec(body);
  if (!match) return undefined;

  const rest = match[2];
  return {
    name: match[1].toLowerCase(),
    args: rest.length > 0 ? rest.split(/\s+/) : [],
    rest,
  };
}
