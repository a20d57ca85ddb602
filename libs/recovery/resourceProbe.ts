import os from 'os';
import fs from 'fs';
import { logger } from '../logging/logger.js';
import { ResourceSnapshot } from './recoveryTypes.js';

/**
 * Host resource reading attached to each incident.
 * Diagnostic only: a failed reading degrades the snapshot, it never
 * aborts the decision path.
 */
export interface ResourceProbe {
    capture(): ResourceSnapshot;
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] };
type AvailableSnapshot = Mutable<Extract<ResourceSnapshot, { status: 'available' }>>;

function round(value: number): number {
    return Math.round(value * 10) / 10;
}

interface CpuTimes {
    readonly busy: number;
    readonly total: number;
}

function readCpuTimes(): CpuTimes | undefined {
    const cpus = os.cpus();
    if (cpus.length === 0) return undefined;

    let busy = 0;
    let total = 0;
    for (const { times } of cpus) {
        const sum = times.user + times.nice + times.sys + times.idle + times.irq;
        total += sum;
        busy += sum - times.idle;
    }
    return { busy, total };
}

/**
 * cpuPercent is the busy share of CPU time since this probe's previous
 * capture, or since boot on the first capture.
 */
export class HostResourceProbe implements ResourceProbe {
    private previousCpu: CpuTimes | undefined;

    constructor(
        private readonly diskPath: string = '/',
        private readonly procPath: string = '/proc'
    ) { }

    capture(): ResourceSnapshot {
        const snapshot: AvailableSnapshot = { status: 'available' };
        const failures: string[] = [];

        const read = (field: string, reader: () => void) => {
            try {
                reader();
            } catch (error) {
                failures.push(`${field}: ${error instanceof Error ? error.message : String(error)}`);
            }
        };

        read('memory', () => {
            const total = os.totalmem();
            if (total > 0) {
                snapshot.memoryPercent = round(((total - os.freemem()) / total) * 100);
            }
        });

        read('cpu', () => {
            const current = readCpuTimes();
            if (!current) return;

            const busy = current.busy - (this.previousCpu?.busy ?? 0);
            const total = current.total - (this.previousCpu?.total ?? 0);
            this.previousCpu = current;
            if (total > 0) {
                snapshot.cpuPercent = round(Math.min(100, Math.max(0, (busy / total) * 100)));
            }
        });

        read('load', () => {
            const [one = 0, five = 0, fifteen = 0] = os.loadavg();
            snapshot.loadAverage = [one, five, fifteen];
        });

        read('disk', () => {
            const stats = fs.statfsSync(this.diskPath);
            if (stats.blocks > 0) {
                snapshot.diskPercent = round(((stats.blocks - stats.bfree) / stats.blocks) * 100);
            }
        });

        read('processes', () => {
            snapshot.activeProcessCount = fs.readdirSync(this.procPath)
                .filter(entry => /^\d+$/.test(entry)).length;
        });

        if (failures.length > 0) {
            logger.debug({ failures }, 'Resource snapshot incomplete');
        }

        const captured = Object.keys(snapshot).length > 1;
        if (!captured) {
            return Object.freeze({ status: 'unavailable', reason: failures.join('; ') || 'no readings' });
        }

        return Object.freeze(snapshot);
    }
}
