/**
 * Anything with console-shaped level methods. The host usually passes its own.
 */
export interface LogSink {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export class Logger {
    private readonly tag: string;
    private readonly sink: LogSink;

    constructor(tag: string, sink: LogSink = console) {
        this.tag = tag;
        this.sink = sink;
    }

    public child(tag: string): Logger {
        return new Logger(tag, this.sink);
    }

    public debug(message: string): void {
        this.sink.debug(`[${this.tag}] ${message}`);
    }

    public info(message: string): void {
        this.sink.info(`[${this.tag}] ${message}`);
    }

    public warn(message: string): void {
        this.sink.warn(`[${this.tag}] ${message}`);
    }

    public error(message: string): void {
        this.sink.error(`[${this.tag}] ${message}`);
    }
}
