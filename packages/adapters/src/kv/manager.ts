import { ChannelClosedError, type Computation, type KeyValueConnectionPort, type Logger } from '@ticktask/core';
import { Channel, Oneshot, operation, wait, type Operation } from '@ticktask/engine';

export type KeyValueCommand =
    | { kind: 'get'; key: string; reply: Oneshot<string | undefined> }
    | { kind: 'set'; key: string; value: string; reply: Oneshot<void> };

export interface KeyValueManagerOptions {
    connection: KeyValueConnectionPort;
    logger?: Logger;
}

/**
 * Shares one connection between any number of tasks.
 *
 * Clients send commands over a channel, each carrying a one-shot reply. The
 * task running `serve()` owns the connection and handles commands one at a
 * time, in arrival order, until `close()` is called and the backlog drains.
 */
export class KeyValueManager {
    private readonly commands = new Channel<KeyValueCommand>();
    private readonly connection: KeyValueConnectionPort;
    private readonly logger: Logger | undefined;

    constructor(options: KeyValueManagerOptions) {
        this.connection = options.connection;
        this.logger = options.logger?.child({ component: 'kv-manager' });
    }

    /** A connection whose requests go through this manager. */
    public client(): KeyValueConnectionPort {
        const commands = this.commands;
        return {
            get: (key) => operation(function* () {
                const reply = new Oneshot<string | undefined>();
                if (!commands.send({ kind: 'get', key, reply })) {
                    throw new ChannelClosedError('Key-value command channel');
                }
                return yield* wait(reply.received());
            }),
            set: (key, value) => operation(function* () {
                const reply = new Oneshot<void>();
                if (!commands.send({ kind: 'set', key, value, reply })) {
                    throw new ChannelClosedError('Key-value command channel');
                }
                yield* wait(reply.received());
            })
        };
    }

    /** Resolves with the number of commands served. */
    public serve(): Computation<number> {
        return operation(() => this.handleCommands());
    }

    public close(): void {
        this.commands.close();
    }

    private *handleCommands(): Operation<number> {
        let served = 0;
        for (;;) {
            const command = yield* wait(this.commands.recv());
            if (command === undefined) {
                this.logger?.debug({ served }, 'Command channel closed');
                return served;
            }

            this.logger?.trace({ kind: command.kind, key: command.key }, 'Serving command');
            if (command.kind === 'get') {
                command.reply.send(yield* wait(this.connection.get(command.key)));
            } else {
                yield* wait(this.connection.set(command.key, command.value));
                command.reply.send(undefined);
            }
            served += 1;
        }
    }
}
