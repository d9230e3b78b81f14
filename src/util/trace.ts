export interface Tracer {
    info(message: string): void;
    warn(message: string): void;
    error(error: unknown): void;
    dependency<T>(name: string, data: string, operation: () => Promise<T>): Promise<T>;
    metric(message: string, measurements: { [key: string]: number }): void;
    counter(name: string, value: number): void;
}

export class NoOpTracer implements Tracer {
    info(message: string): void {
    }
    warn(message: string): void {
    }
    error(error: unknown): void {
    }
    dependency<T>(name: string, data: string, operation: () => Promise<T>): Promise<T> {
        return operation();
    }
    metric(message: string, measurements: { [key: string]: number }): void {
    }
    counter(name: string, value: number): void {
    }
}

export class ConsoleTracer implements Tracer {
    constructor(
        private readonly prefix: string = '[chat-gateway]'
    ) { }

    info(message: string): void {
        console.log(`${this.prefix} ${message}`);
    }
    warn(message: string): void {
        console.warn(`${this.prefix} ${message}`);
    }
    error(error: unknown): void {
        console.error(this.prefix, error);
    }
    async dependency<T>(name: string, data: string, operation: () => Promise<T>): Promise<T> {
        const start = Date.now();
        try {
            return await operation();
        }
        finally {
            const duration = Date.now() - start;
            console.log(`${this.prefix} Dependency: ${name} (${data}) took ${duration}ms`);
        }
    }

    metric(message: string, measurements: { [key: string]: number }): void {
        console.log(`${this.prefix} Metric: ${message}`, measurements);
    }

    counter(name: string, value: number): void {
        console.log(`${this.prefix} Counter: ${name} = ${value}`);
    }
}

export type TraceLevel = 'info' | 'warn' | 'error' | 'dependency' | 'metric' | 'counter';

export interface TraceEntry {
    level: TraceLevel;
    message: string;
    error?: unknown;
    measurements?: { [key: string]: number };
}

/**
 * Keeps every entry in memory instead of writing it out.
 * Tests install one to assert on what the gateway reported.
 */
export class MemoryTracer implements Tracer {
    readonly entries: TraceEntry[] = [];

    info(message: string): void {
        this.entries.push({ level: 'info', message });
    }
    warn(message: string): void {
        this.entries.push({ level: 'warn', message });
    }
    error(error: unknown): void {
        const message = error instanceof Error ? error.message : String(error);
        this.entries.push({ level: 'error', message, error });
    }
    async dependency<T>(name: string, data: string, operation: () => Promise<T>): Promise<T> {
        this.entries.push({ level: 'dependency', message: `${name} ${data}` });
        return await operation();
    }
    metric(message: string, measurements: { [key: string]: number }): void {
        this.entries.push({ level: 'metric', message, measurements });
    }
    counter(name: string, value: number): void {
        this.entries.push({ level: 'counter', message: `${name} = ${value}` });
    }

    messages(level: TraceLevel): string[] {
        return this.entries
            .filter(entry => entry.level === level)
            .map(entry => entry.message);
    }

    clear(): void {
        this.entries.length = 0;
    }
}

export class Trace {
    private static tracer: Tracer = new ConsoleTracer();

    static configure(tracer: Tracer) {
        Trace.tracer = tracer;
    }

    static off() {
        Trace.tracer = new NoOpTracer();
    }

    static getTracer(): Tracer {
        return Trace.tracer;
    }

    static info(message: string): void {
        this.tracer.info(message);
    }

    static warn(message: string): void {
        this.tracer.warn(message);
    }

    static error(error: unknown): void {
        this.tracer.error(error);
    }

    static dependency<T>(name: string, data: string, operation: () => Promise<T>): Promise<T> {
        return this.tracer.dependency(name, data, operation);
    }

    static metric(message: string, measurements: { [key: string]: number }): void {
        this.tracer.metric(message, measurements);
    }

    static counter(name: string, value: number): void {
        this.tracer.counter(name, value);
    }
}
