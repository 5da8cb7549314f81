import type { BotConfig } from './config/schema';
import type { ChatEvent, ChatFeature, CommandHelp } from './features';

export class HelpFeature implements ChatFeature {
  readonly name = 'help';
  readonly commands: readonly CommandHelp[] = [
    { usage: 'help [command]', description: 'List commands, or describe one' },
  ];

  private prefix: string;
  private features: () => readonly ChatFeature[];

  constructor(config: BotConfig, features: () => readonly ChatFeature[]) {
    this.prefix = config.prefix;
    this.features = features;
  }

  async handle(event: ChatEvent): Promise<string[]> {
    if (!event.command || event.command.name !== 'help') return [];

    const all = this.features().flatMap((feature) => feature.commands);
    const wanted = event.command.args[0]?.toLowerCase();

    if (wanted) {
      const found = all.filter((command) => command.usage.split(' ')[0].split('|').includes(wanted));
      if (found.length === 0) return [`No help for "${wanted}".`];
      return found.map((command) => `${this.prefix}${command.usage} - ${command.description}`);
    }

    const names = all.map((command) => command.usage.split(' ')[0]);
    return [`Commands: ${names.map((name) => `${this.prefix}${name}`).join(', ')}`];
  }
}
