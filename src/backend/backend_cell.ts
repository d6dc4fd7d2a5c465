// src/backend/backend_cell.ts

import type { Backend } from './types';

export class BackendAlreadySelectedError extends Error {
    constructor(public readonly selected: Backend) {
        super(`Backend already selected: ${selected.kind}`);
        this.name = 'BackendAlreadySelectedError';
    }
}

/**
 * Set-once holder for the selected backend. Once filled it keeps the same
 * instance for the life of the process.
 */
export class BackendCell {
    private value: Backend | undefined;
    private selecting = false;

    get(): Backend | undefined {
        return this.value;
    }

    isSet(): boolean {
        return this.value !== undefined;
    }

    set(backend: Backend): void {
        if (this.value !== undefined) {
            throw new BackendAlreadySelectedError(this.value);
        }
        this.value = backend;
    }

    /**
     * Runs `select` with the cell held, so a factory that re-enters
     * resolution cannot create a second backend. Returns the cell's value
     * afterwards.
     */
    withSelectionLock(select: () => Backend | undefined): Backend | undefined {
        if (this.value !== undefined) return this.value;
        if (this.selecting) {
            throw new Error('Backend selection is already in progress');
        }
        this.selecting = true;
        try {
            const chosen = select();
            if (chosen !== undefined) this.set(chosen);
            return this.value;
        } finally {
            this.selecting = false;
        }
    }
}

/** The backend slot shared by the whole process. */
export const processBackendCell = new BackendCell();
