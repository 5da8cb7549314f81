// irc-upd ships no type declarations and has no @types package.
declare module 'irc-upd' {
  import { EventEmitter } from 'events';

  namespace irc {
    interface ClientOptions {
      userName?: string;
      realName?: string;
      password?: string;
      port?: number;
      secure?: boolean | object;
      channels?: string[];
      autoConnect?: boolean;
      autoRenick?: boolean;
      retryCount?: number;
      floodProtection?: boolean;
      floodProtectionDelay?: number;
      sasl?: boolean;
      encoding?: string;
      [option: string]: unknown;
    }

    class Client extends EventEmitter {
      constructor(server: string, nick: string, options?: ClientOptions);
      nick: string;
      connect(retryCount?: number, callback?: () => void): void;
      disconnect(message?: string, callback?: () => void): void;
      say(target: string, text: string): void;
      send(command: string, ...args: string[]): void;
      join(channel: string, callback?: () => void): void;
    }

    function canConvertEncoding(): boolean;
  }

  export = irc;
}
