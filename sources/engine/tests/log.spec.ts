/**
 * Delta log
 * Causal frontier, delta computation, acknowledgements and folding
 */

import { describe, it, expect } from 'vitest';
import { DeltaLog, createDocument, type LogEntry, type OperationId } from '../index';
import { operation } from './test-helpers';

function op(replica: string, seq: number, documentId = 'doc-1', dependencies: OperationId[] = []): LogEntry {
    return {
        type: 'operation',
        operation: operation({ replica, seq }, documentId, { kind: 'SetTitle', title: `${replica}${seq}` }, undefined, dependencies),
    };
}

function checkpoint(replica: string, seq: number, documentId: string, covers: OperationId[]): LogEntry {
    return {
        type: 'checkpoint',
        checkpoint: {
            id: { replica, seq },
            timestamp: { wall: 1, logical: 0, replica },
            documentId,
            document: createDocument(documentId),
            covers,
        },
    };
}

describe('DeltaLog', () => {
    describe('Frontier', () => {
        it('should advance the owner counter on append', () => {
            const log = new DeltaLog('a');
            expect(log.nextSequence()).toBe(1);

            log.append(op('a', 1));
            log.append(op('a', 2));

            expect(log.summary()).toEqual({ a: 2 });
            expect(log.nextSequence()).toBe(3);
            expect(log.size).toBe(2);
        });

        it('should hold counters seen ahead of the frontier until it catches up', () => {
            const log = new DeltaLog('a');

            log.append(checkpoint('b', 5, 'doc-1', [{ replica: 'b', seq: 1 }, { replica: 'b', seq: 2 }]));
            expect(log.summary()).toEqual({ b: 2 });
            expect(log.has({ replica: 'b', seq: 5 })).toBe(true);
            expect(log.has({ replica: 'b', seq: 3 })).toBe(false);

            log.append(op('b', 3, 'doc-2'));
            log.append(op('b', 4, 'doc-2'));
            expect(log.summary()).toEqual({ b: 5 });
        });

        it('should list unmet dependencies', () => {
            const log = new DeltaLog('a');
            log.append(op('b', 1));
            const entry = op('c', 1, 'doc-1', [{ replica: 'b', seq: 1 }, { replica: 'b', seq: 2 }]);
            if (entry.type !== 'operation') {
                throw new Error('expected an operation');
            }

            expect(log.missingDependencies(entry.operation)).toEqual([{ replica: 'b', seq: 2 }]);
        });
    });

    describe('deltaSince', () => {
        it('should return unseen operations in log order', () => {
            const log = new DeltaLog('a');
            log.append(op('a', 1));
            log.append(op('a', 2));
            log.append(op('b', 1, 'doc-1', [{ replica: 'a', seq: 2 }]));

            expect(log.deltaSince({ a: 1 })).toEqual([op('a', 2), op('b', 1, 'doc-1', [{ replica: 'a', seq: 2 }])]);
            expect(log.deltaSince({ a: 2, b: 1 })).toEqual([]);
        });

        it('should emit checkpoints before operations', () => {
            const log = new DeltaLog('a');
            log.append(op('a', 1, 'doc-2'));
            log.append(checkpoint('b', 2, 'doc-1', [{ replica: 'b', seq: 1 }]));

            const delta = log.deltaSince({});
            expect(delta.map((entry) => entry.type)).toEqual(['checkpoint', 'operation']);
        });

        it('should send a checkpoint while any id it covers is unseen', () => {
            const log = new DeltaLog('a');
            log.append(checkpoint('a', 3, 'doc-1', [{ replica: 'a', seq: 1 }, { replica: 'a', seq: 2 }]));

            expect(log.deltaSince({ a: 2 })).toHaveLength(1);
            expect(log.deltaSince({ a: 3 })).toHaveLength(0);
        });
    });

    describe('Acknowledgements', () => {
        it('should only grow', () => {
            const log = new DeltaLog('a');
            log.acknowledge('b', { a: 3 });
            log.acknowledge('b', { a: 1, c: 2 });
            log.acknowledge('a', { a: 9 });

            expect(log.acknowledged()).toEqual({ b: { a: 3, c: 2 } });
        });

        it('should know every author and every acknowledging peer', () => {
            const log = new DeltaLog('a');
            log.append(op('a', 1));
            log.append(op('c', 1));
            log.acknowledge('b', { a: 1 });

            expect(log.knownReplicas()).toEqual(['b', 'c']);
        });

        it('should require every known replica to cover an id', () => {
            const log = new DeltaLog('a');
            log.append(op('a', 1));
            expect(log.observedEverywhere({ replica: 'a', seq: 1 })).toBe(true);

            log.append(op('c', 1));
            log.acknowledge('b', { a: 1, c: 1 });
            expect(log.observedEverywhere({ replica: 'a', seq: 1 })).toBe(false);

            log.acknowledge('c', { a: 1 });
            expect(log.observedEverywhere({ replica: 'a', seq: 1 })).toBe(true);
            expect(log.observedEverywhere({ replica: 'c', seq: 1 })).toBe(false);
        });
    });

    describe('Folding', () => {
        it('should replace folded entries with the checkpoint at the first position', () => {
            const log = new DeltaLog('a');
            log.append(op('a', 1, 'doc-1'));
            log.append(op('a', 2, 'doc-2'));
            log.append(op('a', 3, 'doc-1'));

            const entries = log.entriesByDocument().get('doc-1') ?? [];
            const folded = checkpoint('a', 4, 'doc-1', DeltaLog.coveredIds(entries));
            if (folded.type !== 'checkpoint') {
                throw new Error('expected a checkpoint');
            }
            log.fold([folded.checkpoint]);

            expect(log.read()).toEqual([folded, op('a', 2, 'doc-2')]);
            expect(log.generation).toBe(1);
            expect(log.summary()).toEqual({ a: 4 });
        });

        it('should trigger on size or on entries since the last checkpoint', () => {
            const log = new DeltaLog('a');
            log.append(op('a', 1));
            log.append(op('a', 2));

            expect(log.shouldCompact({ maxLogEntries: 10, checkpointInterval: 2 })).toBe(true);
            expect(log.shouldCompact({ maxLogEntries: 1, checkpointInterval: 10 })).toBe(true);
            expect(log.shouldCompact({ maxLogEntries: 10, checkpointInterval: 10 })).toBe(false);

            log.markChecked();
            expect(log.shouldCompact({ maxLogEntries: 10, checkpointInterval: 2 })).toBe(false);
        });
    });
});
