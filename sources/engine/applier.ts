/**
 * Causal delivery of received log entries
 */

import { CausalityGapError } from './errors';
import { compareOperationIds, operationKey } from './helpers';
import type { ReplicaStore } from './store';
import type { LogEntry, Operation, OperationId } from './types';

export interface DeltaApplierOptions {
    /** Runs after every applied entry, before the next one is integrated */
    afterApply?: (entry: LogEntry) => Promise<void>;
}

/**
 * Feeds entries into a store in causal order
 *
 * Operations whose dependencies are not yet observed are held back and
 * retried each time something new is applied. Whatever is still held when
 * the stream ends is a causality gap.
 */
export class DeltaApplier {
    private held: Operation[] = [];
    private appliedCount = 0;
    private duplicateCount = 0;

    constructor(
        private readonly store: ReplicaStore,
        private readonly options: DeltaApplierOptions = {},
    ) {}

    get applied(): number {
        return this.appliedCount;
    }

    get duplicates(): number {
        return this.duplicateCount;
    }

    /**
     * Operations waiting for dependencies
     */
    get pending(): number {
        return this.held.length;
    }

    async push(entry: LogEntry): Promise<void> {
        const result = this.store.integrate(entry);
        switch (result.status) {
            case 'duplicate':
                this.duplicateCount += 1;
                return;
            case 'blocked':
                if (entry.type === 'operation') {
                    this.held.push(entry.operation);
                }
                return;
            case 'applied':
                await this.record(entry);
                await this.release();
                return;
        }
    }

    async pushAll(entries: readonly LogEntry[]): Promise<void> {
        for (const entry of entries) {
            await this.push(entry);
        }
    }

    /**
     * End of stream
     * @throws CausalityGapError when held operations still miss dependencies
     */
    finish(): void {
        if (this.held.length === 0) {
            return;
        }
        const missing = new Map<string, OperationId>();
        for (const operation of this.held) {
            for (const id of this.store.deltaLog.missingDependencies(operation)) {
                missing.set(operationKey(id), id);
            }
        }
        throw new CausalityGapError([...missing.values()].sort(compareOperationIds));
    }

    private async record(entry: LogEntry): Promise<void> {
        this.appliedCount += 1;
        if (this.options.afterApply) {
            await this.options.afterApply(entry);
        }
    }

    // Retry held operations until a full pass makes no progress
    private async release(): Promise<void> {
        let progressed = true;
        while (progressed && this.held.length > 0) {
            progressed = false;
            const waiting = this.held;
            this.held = [];
            for (const operation of waiting) {
                const entry: LogEntry = { type: 'operation', operation };
                const result = this.store.integrate(entry);
                if (result.status === 'blocked') {
                    this.held.push(operation);
                    continue;
                }
                progressed = true;
                if (result.status === 'applied') {
                    await this.record(entry);
                } else {
                    this.duplicateCount += 1;
                }
            }
        }
    }
}
