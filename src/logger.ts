export type LogSink = (line: string) => void;

/**
 * Everything goes to stderr: stdout carries the scan result, or the MCP
 * protocol when running as a server.
 */
export class Logger {
    constructor(
        private readonly verbose: boolean = false,
        private readonly sink: LogSink = line => console.error(line)
    ) {}

    public debug(message: string) {
        if (this.verbose) this.sink(`DEBUG ${message}`);
    }

    public warn(message: string) {
        this.sink(`WARN ${message}`);
    }

    public error(message: string) {
        this.sink(`ERROR ${message}`);
    }
}
