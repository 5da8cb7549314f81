import { LRUCache } from 'lru-cache';
import { logger } from '../logger';
import type { BotConfig } from '../config/schema';
import type { ChatEvent, ChatFeature, CommandHelp, ParsedCommand } from '../features';
import {
  normalizeNick,
  type CaseRegistry,
  type DuplicatePolicy,
  type StateChangeEvent,
} from './case-registry';
import { describeState } from './case-state';
import {
  BoardError,
  CaseNotFoundError,
  DuplicateActiveCaseError,
  InvalidTransitionError,
} from './errors';
import { parseSignalDetails, SignalDetector } from './signal-detector';
import {
  CLOSE_REASONS,
  type CaseEventType,
  type CaseStatus,
  type CloseReason,
  type Platform,
  type RescueCase,
} from './types';

type CommandHandler = (command: ParsedCommand, event: ChatEvent) => Promise<string[]>;

export const BOARD_COMMANDS: readonly CommandHelp[] = [
  { usage: 'list', description: 'List open cases' },
  { usage: 'case <case>', description: 'Show one case' },
  { usage: 'open [-f] <nick> [text]', description: 'Open a case by hand; -f (admins) allows a second case' },
  { usage: 'assign|go <case> <rat...>', description: 'Assign rats to a case' },
  { usage: 'unassign|standdown <case> <rat...>', description: 'Remove rats from a case' },
  { usage: 'grab <nick>', description: "Add the nick's last line to their case" },
  { usage: 'sys <case> <system>', description: 'Set the system' },
  { usage: 'pc|xb|ps <case>', description: 'Set the platform' },
  { usage: 'cr <case>', description: 'Mark a case code red' },
  { usage: 'note <case> <text>', description: 'Add a note' },
  { usage: 'ready <case>', description: 'Rats in position, call for jump' },
  { usage: 'pause <case>', description: 'Pause a case' },
  { usage: 'resume <case>', description: 'Resume a paused case' },
  { usage: 'success <case>', description: 'Close a case as a success' },
  { usage: 'close <case> [reason]', description: `Close a case (${CLOSE_REASONS.filter((r) => r !== 'purged').join(', ')})` },
  { usage: 'purge <case>', description: 'Drop a case without a rescue (admins)' },
];

const STATUS_WORDS: Record<CaseStatus, string> = {
  open: 'open',
  assigned: 'assigned',
  callForJump: 'waiting for the jump',
  paused: 'paused',
  closed: 'closed',
};

const EVENT_WORDS: Record<CaseEventType, string> = {
  assign: 'assign rats to',
  unassign: 'unassign rats from',
  ready: 'call for jump on',
  pause: 'pause',
  resume: 'resume',
  succeed: 'mark success on',
  close: 'close',
};

export function formatCase(rescue: RescueCase): string {
  const parts = [
    `#${rescue.id} ${rescue.client}`,
    `[${describeState(rescue.state)}]`,
    rescue.platform ? rescue.platform.toUpperCase() : 'platform unknown',
    rescue.system ?? 'system unknown',
  ];
  if (rescue.codeRed) parts.push('CODE RED');
  parts.push(rescue.responders.length > 0 ? `rats: ${rescue.responders.join(', ')}` : 'no rats');
  return parts.join(' - ');
}

export function describeBoardError(error: BoardError): string {
  if (error instanceof DuplicateActiveCaseError || error instanceof CaseNotFoundError) {
    return `${error.message}.`;
  }
  if (error instanceof InvalidTransitionError) {
    return `Cannot ${EVENT_WORDS[error.event]} a case that is ${STATUS_WORDS[error.from]}.`;
  }
  return 'Board storage is unavailable, nothing was changed. Keep the board by hand until it recovers.';
}

/**
 * The rescue board as a chat feature: signals in plain lines open cases,
 * prefixed commands drive them through the registry.
 */
export class RatBoardFeature implements ChatFeature {
  readonly name = 'rat-board';
  readonly commands = BOARD_COMMANDS;

  private registry: CaseRegistry;
  private detector: SignalDetector;
  private prefixes: string[];
  private prefix: string;
  private admins: Set<string>;
  private duplicatePolicy: DuplicatePolicy;
  private handlers: Record<string, CommandHandler>;
  // last plain line per nick, for grab
  private recentLines: LRUCache<string, string>;

  constructor(registry: CaseRegistry, config: BotConfig) {
    this.registry = registry;
    this.detector = new SignalDetector(config.ratboard);
    this.prefix = config.prefix;
    this.prefixes = config.help_prefix ? [config.prefix, config.help_prefix] : [config.prefix];
    this.admins = new Set(config.ratboard.admins.map(normalizeNick));
    this.duplicatePolicy = config.ratboard.duplicatePolicy;
    this.recentLines = new LRUCache<string, string>({ max: config.ratboard.recentLines });

    const assign: CommandHandler = (command, event) => this.assign(command, event);
    const unassign: CommandHandler = (command, event) => this.unassign(command, event);
    const platform = (value: Platform): CommandHandler => (command, event) => this.setPlatform(value, command, event);

    this.handlers = {
      list: async () => this.list(),
      case: async (command) => this.show(command),
      open: (command, event) => this.open(command, event),
      assign,
      go: assign,
      unassign,
      standdown: unassign,
      grab: (command, event) => this.grab(command, event),
      sys: (command, event) => this.setSystem(command, event),
      pc: platform('pc'),
      xb: platform('xb'),
      ps: platform('ps'),
      cr: (command, event) => this.codeRed(command, event),
      note: (command, event) => this.note(command, event),
      ready: (command, event) => this.changeState(command, event, { type: 'ready' }),
      pause: (command, event) => this.changeState(command, event, { type: 'pause' }),
      resume: (command, event) => this.changeState(command, event, { type: 'resume' }),
      success: (command, event) => this.changeState(command, event, { type: 'succeed' }),
      close: (command, event) => this.close(command, event),
      purge: (command, event) => this.purge(command, event),
    };
  }

  async handle(event: ChatEvent): Promise<string[]> {
    if (!event.command) {
      return this.handleChat(event);
    }

    const handler = Object.prototype.hasOwnProperty.call(this.handlers, event.command.name)
      ? this.handlers[event.command.name]
      : undefined;
    if (!handler) return [];

    try {
      return await handler(event.command, event);
    } catch (error) {
      if (error instanceof BoardError) {
        logger.debug(`Board command ${event.command.name} from ${event.sender} refused: ${error.message}`);
        return [describeBoardError(error)];
      }
      throw error;
    }
  }

  private async handleChat(event: ChatEvent): Promise<string[]> {
    if (event.text.trim()) {
      this.recentLines.set(normalizeNick(event.sender), event.text.trim());
    }

    const match = this.detector.detect(event.text, event.sender, this.prefixes, event.channel);
    if (!match) return [];

    try {
      const result = await this.registry.openCase(match.reporter, match.text, match.channel, {
        policy: this.duplicatePolicy,
        details: match.details,
      });
      return [this.describeOpen(result.id, result.created, match.reporter)];
    } catch (error) {
      if (error instanceof BoardError) {
        return [describeBoardError(error)];
      }
      throw error;
    }
  }

  private describeOpen(id: number, created: boolean, reporter: string): string {
    const rescue = this.registry.lookup(id);
    if (!created) return `Signal from ${reporter} added to case #${id}.`;
    return rescue ? `Case opened: ${formatCase(rescue)}` : `Case #${id} opened.`;
  }

  private usage(usage: string): string[] {
    return [`Usage: ${this.prefix}${usage}`];
  }

  private isAdmin(nick: string): boolean {
    return this.admins.has(normalizeNick(nick));
  }

  private caseId(ref: string): number {
    const rescue = this.registry.resolve(ref);
    if (!rescue) throw notFound(ref);
    return rescue.id;
  }

  private list(): string[] {
    const open = this.registry.listOpen();
    if (open.length === 0) return ['No open cases.'];
    return [`${open.length} open case(s):`, ...open.map(formatCase)];
  }

  private show(command: ParsedCommand): string[] {
    const [ref] = command.args;
    if (!ref) return this.usage('case <case>');
    const rescue = this.registry.resolve(ref);
    if (!rescue) throw notFound(ref);
    const lines = [formatCase(rescue)];
    if (rescue.notes.length > 0) lines.push(`Notes: ${rescue.notes.join(' | ')}`);
    return lines;
  }

  private async open(command: ParsedCommand, event: ChatEvent): Promise<string[]> {
    const force = command.args[0] === '-f';
    const args = force ? command.args.slice(1) : command.args;
    const [nick, ...words] = args;
    if (!nick) return this.usage('open [-f] <nick> [text]');
    if (force && !this.isAdmin(event.sender)) {
      return ['Only board admins can open a second case for the same client.'];
    }

    const text = words.length > 0 ? words.join(' ') : `Opened by ${event.sender}`;
    const result = await this.registry.openCase(nick, text, event.channel, {
      policy: force ? 'allow' : 'reject',
      actor: event.sender,
      details: parseSignalDetails(text),
    });
    return [this.describeOpen(result.id, result.created, nick)];
  }

  private async assign(command: ParsedCommand, event: ChatEvent): Promise<string[]> {
    const [ref, ...rats] = command.args;
    if (!ref || rats.length === 0) return this.usage('assign <case> <rat...>');
    const id = this.caseId(ref);
    await this.registry.assignAll(id, rats, event.sender);
    return [`Assigned ${rats.join(', ')} to case #${id}.`];
  }

  private async unassign(command: ParsedCommand, event: ChatEvent): Promise<string[]> {
    const [ref, ...rats] = command.args;
    if (!ref || rats.length === 0) return this.usage('unassign <case> <rat...>');
    const id = this.caseId(ref);
    await this.registry.unassignAll(id, rats, event.sender);
    return [`Unassigned ${rats.join(', ')} from case #${id}.`];
  }

  private async grab(command: ParsedCommand, event: ChatEvent): Promise<string[]> {
    const [nick] = command.args;
    if (!nick) return this.usage('grab <nick>');
    const line = this.recentLines.get(normalizeNick(nick));
    if (!line) return [`No recent line from ${nick}.`];
    const id = this.caseId(nick);
    await this.registry.annotate(id, { note: line }, event.sender);
    return [`Grabbed last line from ${nick} into case #${id}.`];
  }

  private async setSystem(command: ParsedCommand, event: ChatEvent): Promise<string[]> {
    const [ref, ...words] = command.args;
    if (!ref || words.length === 0) return this.usage('sys <case> <system>');
    const id = this.caseId(ref);
    const system = words.join(' ');
    await this.registry.annotate(id, { system }, event.sender);
    return [`Case #${id} system set to ${system}.`];
  }

  private async setPlatform(platform: Platform, command: ParsedCommand, event: ChatEvent): Promise<string[]> {
    const [ref] = command.args;
    if (!ref) return this.usage(`${platform} <case>`);
    const id = this.caseId(ref);
    await this.registry.annotate(id, { platform }, event.sender);
    return [`Case #${id} platform set to ${platform.toUpperCase()}.`];
  }

  private async codeRed(command: ParsedCommand, event: ChatEvent): Promise<string[]> {
    const [ref] = command.args;
    if (!ref) return this.usage('cr <case>');
    const id = this.caseId(ref);
    await this.registry.annotate(id, { codeRed: true }, event.sender);
    return [`Case #${id} is now CODE RED.`];
  }

  private async note(command: ParsedCommand, event: ChatEvent): Promise<string[]> {
    const [ref, ...words] = command.args;
    if (!ref || words.length === 0) return this.usage('note <case> <text>');
    const id = this.caseId(ref);
    await this.registry.annotate(id, { note: words.join(' ') }, event.sender);
    return [`Note added to case #${id}.`];
  }

  private async changeState(
    command: ParsedCommand,
    event: ChatEvent,
    change: StateChangeEvent,
  ): Promise<string[]> {
    const [ref] = command.args;
    if (!ref) return this.usage(`${command.name} <case>`);
    const id = this.caseId(ref);
    const state = await this.registry.updateState(id, change, event.sender);
    if (state.status === 'closed') {
      return [`Case #${id} ${describeState(state).toLowerCase()}.`];
    }
    return [`Case #${id} is now ${describeState(state)}.`];
  }

  private async close(command: ParsedCommand, event: ChatEvent): Promise<string[]> {
    const [ref, reasonArg] = command.args;
    if (!ref) return this.usage('close <case> [reason]');
    const reason = parseCloseReason(reasonArg);
    if (!reason) {
      return [`Unknown close reason "${reasonArg}". Use one of: ${CLOSE_REASONS.filter((r) => r !== 'purged').join(', ')}.`];
    }
    const id = this.caseId(ref);
    await this.registry.close(id, reason, event.sender);
    return [`Case #${id} closed (${reason}).`];
  }

  private async purge(command: ParsedCommand, event: ChatEvent): Promise<string[]> {
    const [ref] = command.args;
    if (!ref) return this.usage('purge <case>');
    if (!this.isAdmin(event.sender)) return ['Only board admins can purge cases.'];
    const id = this.caseId(ref);
    await this.registry.purge(id, event.sender);
    return [`Case #${id} purged.`];
  }
}

function notFound(ref: string): CaseNotFoundError {
  const numeric = /^#?(\d+)$/.exec(ref.trim());
  return new CaseNotFoundError(numeric ? Number(numeric[1]) : ref);
}

function parseCloseReason(value: string | undefined): CloseReason | undefined {
  if (value === undefined) return 'closed';
  const lowered = value.toLowerCase();
  return CLOSE_REASONS.find((reason) => reason === lowered && reason !== 'purged');
}
