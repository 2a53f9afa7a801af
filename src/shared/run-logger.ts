/**
 * Run logger - writes to the console and keeps a timestamped copy
 * that is appended to logs/transcribe-{timestamp}.log when the run ends.
 */

import * as fs from 'fs/promises';
import * as path from 'path';

export interface Logger {
    log(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export class RunLogger implements Logger {
    private logDir: string;
    private logPath: string;
    private lines: string[] = [];
    private startTime: Date;

    constructor(logDir: string, startTime: Date = new Date()) {
        this.logDir = logDir;
        this.startTime = startTime;
        const timestamp = startTime.toISOString().replace(/[:.]/g, '-');
        this.logPath = path.join(logDir, `transcribe-${timestamp}.log`);
    }

    log(message: string): void {
        console.log(message);
        this.record('', message);
    }

    warn(message: string): void {
        console.warn(`⚠️ ${message}`);
        this.record('WARN: ', message);
    }

    error(message: string): void {
        console.error(`❌ ${message}`);
        this.record('ERROR: ', message);
    }

    /**
     * Append the collected lines to the run's log file
     */
    async save(): Promise<string> {
        await fs.mkdir(this.logDir, { recursive: true });
        const duration = (Date.now() - this.startTime.getTime()) / 1000;
        this.lines.push(`[${new Date().toISOString()}] Completed in ${duration.toFixed(1)}s`);
        await fs.appendFile(this.logPath, this.lines.join('\n') + '\n', 'utf-8');
        this.lines = [];
        return this.logPath;
    }

    private record(prefix: string, message: string): void {
        const timestamp = new Date().toISOString();
        for (const line of message.split('\n')) {
            this.lines.push(`[${timestamp}] ${prefix}${line}`);
        }
    }
}
