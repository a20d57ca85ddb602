/**
 * Rebound Incident Ledger
 *
 * Bounded append-only arena owning every FailureContext by value.
 * Incidents refer to each other by id; the oldest entries are evicted
 * first once capacity is exceeded.
 *
 * Appends and statistics run to completion on the event loop, so there is
 * exactly one writer at a time and every read sees a consistent snapshot.
 */

import { logger } from '../logging/logger.js';
import { ReboundError } from '../errors/sanitizer.js';
import {
    ErrorKind,
    FailureContext,
    IncidentStatistics,
    RecentIncident
} from './recoveryTypes.js';

export const DEFAULT_LEDGER_CAPACITY = 1000;

export interface StatisticsOptions {
    /** Window counted as "recent" */
    readonly recentWindowSeconds: number;
    /** Most recent incidents listed for display */
    readonly recentLimit: number;
}

export const DEFAULT_STATISTICS_OPTIONS: StatisticsOptions = Object.freeze({
    recentWindowSeconds: 3600,
    recentLimit: 10
});

export class IncidentLedger {
    private entries: FailureContext[] = [];
    private readonly byId = new Map<string, FailureContext>();

    constructor(public readonly capacity: number = DEFAULT_LEDGER_CAPACITY) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new ReboundError(
                `Ledger capacity must be a positive integer, got ${capacity}`,
                { capacity },
                'CONFIG',
                { contextLabel: 'IncidentLedger' }
            );
        }
    }

    get size(): number {
        return this.entries.length;
    }

    /**
     * Insert at the tail, then evict from the head while over capacity.
     */
    append(context: FailureContext): void {
        this.entries.push(context);
        this.byId.set(context.incidentId, context);

        const overflow = this.entries.length - this.capacity;
        if (overflow > 0) {
            const evicted = this.entries.splice(0, overflow);
            for (const incident of evicted) {
                this.byId.delete(incident.incidentId);
            }
            logger.debug({ evicted: evicted.length, capacity: this.capacity }, 'Ledger evicted oldest incidents');
        }
    }

    get(incidentId: string): FailureContext | undefined {
        return this.byId.get(incidentId);
    }

    /**
     * Ids of retained incidents for the same tool and target, oldest first.
     */
    lineage(toolName: string, target: string): string[] {
        return this.entries
            .filter(e => e.toolName === toolName && e.target === target)
            .map(e => e.incidentId);
    }

    /**
     * Retained incidents in append order.
     */
    snapshot(): readonly FailureContext[] {
        return Object.freeze([...this.entries]);
    }

    /**
     * Aggregate counts, derived on every call.
     */
    statistics(now: Date = new Date(), options: StatisticsOptions = DEFAULT_STATISTICS_OPTIONS): IncidentStatistics {
        const byKind: Partial<Record<ErrorKind, number>> = {};
        const byTool: Record<string, number> = {};
        const recent: RecentIncident[] = [];
        const windowStart = now.getTime() - options.recentWindowSeconds * 1000;

        for (const incident of this.entries) {
            byKind[incident.errorKind] = (byKind[incident.errorKind] ?? 0) + 1;
            byTool[incident.toolName] = (byTool[incident.toolName] ?? 0) + 1;

            if (Date.parse(incident.timestamp) > windowStart) {
                recent.push({
                    incidentId: incident.incidentId,
                    tool: incident.toolName,
                    errorKind: incident.errorKind,
                    timestamp: incident.timestamp
                });
            }
        }

        return Object.freeze({
            total: this.entries.length,
            byKind,
            byTool,
            recentCount: recent.length,
            recent: recent.slice(-options.recentLimit)
        });
    }
}
