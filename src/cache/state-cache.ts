export type Snowflake = string;

/**
 * Any object the platform identifies by id. Fields beyond `id` are kept
 * exactly as the server sent them.
 */
export interface RemoteObject {
    id: Snowflake;
    [field: string]: unknown;
}

export type User = RemoteObject;
export type Guild = RemoteObject;
export type Channel = RemoteObject;

export interface ReadyData {
    sessionId: string;
    user: User;
    guilds: Guild[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseRemoteObject(value: unknown, kind: string): RemoteObject {
    if (!isRecord(value)) throw new Error(`Expected ${kind} to be an object.`);
    const id = value.id;
    if (typeof id !== 'string') throw new Error(`Expected ${kind} to have a string 'id' property.`);
    return { ...value, id };
}

export function parseReady(data: unknown): ReadyData {
    if (!isRecord(data)) throw new Error("Expected READY data to be an object.");
    if (typeof data.session_id !== 'string') throw new Error("Expected a string 'session_id' property.");
    const guilds = data.guilds ?? [];
    if (!Array.isArray(guilds)) throw new Error("Expected 'guilds' to be an array.");
    return {
        sessionId: data.session_id,
        user: parseRemoteObject(data.user, 'user'),
        guilds: guilds.map(guild => parseRemoteObject(guild, 'guild'))
    };
}

/**
 * The few remote objects the client keeps locally: who it is, and which
 * guilds and channels it can see.
 */
export class StateCache {
    private currentUser: User | null = null;
    readonly guilds = new Map<Snowflake, Guild>();
    readonly channels = new Map<Snowflake, Channel>();

    get user(): User | null {
        return this.currentUser;
    }

    applyReady(ready: ReadyData): void {
        this.currentUser = ready.user;
        for (const guild of ready.guilds) {
            this.guilds.set(guild.id, guild);
        }
    }

    addGuild(data: unknown): Guild {
        const guild = parseRemoteObject(data, 'guild');
        this.guilds.set(guild.id, guild);
        const channels = guild.channels;
        if (Array.isArray(channels)) {
            for (const channel of channels) {
                this.upsertChannel(channel);
            }
        }
        return guild;
    }

    upsertChannel(data: unknown): Channel {
        const channel = parseRemoteObject(data, 'channel');
        this.channels.set(channel.id, channel);
        return channel;
    }

    removeChannel(data: unknown): boolean {
        const channel = parseRemoteObject(data, 'channel');
        return this.channels.delete(channel.id);
    }

    clear(): void {
        this.currentUser = null;
        this.guilds.clear();
        this.channels.clear();
    }
}
