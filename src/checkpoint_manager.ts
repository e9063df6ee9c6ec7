/**
 * Checkpoint Manager
 *
 * Deep, independent snapshots of the world state keyed by opaque tokens.
 * Tokens are sequential per manager so traces stay reproducible.
 */

import { createLogger } from './logger';
import { ErrorFactory } from './structured_error';
import { cloneWorldState, replaceWorldState } from './world_state';
import { WorldState } from './types';

const log = createLogger('checkpoint');

export class CheckpointManager {
    private snapshots: Map<string, WorldState> = new Map();
    private counter = 0;

    snapshot(state: WorldState): string {
        const token = `cp-${++this.counter}`;
        this.snapshots.set(token, cloneWorldState(state));
        return token;
    }

    /**
     * Replace `live` wholesale with the snapshot. The stored snapshot is left
     * untouched so the token can be restored again.
     *
     * @throws RuntimeInvariantError (CHECKPOINT_UNKNOWN)
     */
    restore(token: string, live: WorldState): WorldState {
        const snap = this.snapshots.get(token);
        if (!snap) {
            log.error('Restore of unknown checkpoint', { token });
            throw ErrorFactory.checkpointUnknown(token);
        }
        replaceWorldState(live, snap);
        log.debug('Checkpoint restored', { token });
        return live;
    }

    release(token: string): void {
        this.snapshots.delete(token);
    }

    has(token: string): boolean {
        return this.snapshots.has(token);
    }

    get size(): number {
        return this.snapshots.size;
    }
}
