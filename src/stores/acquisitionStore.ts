import { createStore } from 'zustand/vanilla';
import type { ErrorKind } from '../services/cache/errors';
import type { ScanKey } from '../services/cache/keys';

export type TaskKind = 'archive' | 'realtime';

export type TaskState = 'Queued' | 'Active' | 'Completed' | 'Failed' | 'Canceled';

export interface AcquisitionTask {
  id: string;
  kind: TaskKind;
  scan: ScanKey;
  state: TaskState;
  /** Fetch attempts made so far (retries included) */
  attempts: number;
  recordsStored: number;
  /** Archive object key, when the task downloads a file */
  fileName?: string;
  errorKind?: ErrorKind;
  error?: string;
  queuedAt: number;
  startedAt?: number;
  finishedAt?: number;
}

const NEXT_STATES: Record<TaskState, TaskState[]> = {
  Queued: ['Active', 'Canceled'],
  Active: ['Completed', 'Failed', 'Canceled'],
  Completed: [],
  Failed: [],
  Canceled: [],
};

export function canTransition(from: TaskState, to: TaskState): boolean {
  return NEXT_STATES[from].includes(to);
}

export function isTerminal(state: TaskState): boolean {
  return NEXT_STATES[state].length === 0;
}

export interface AcquisitionState {
  /** Tasks by id */
  tasks: Record<string, AcquisitionTask>;

  addTask: (task: AcquisitionTask) => void;
  /** Apply a state change; transitions the lifecycle does not allow are ignored */
  transition: (id: string, to: TaskState, patch?: Partial<AcquisitionTask>) => boolean;
  updateTask: (id: string, patch: Partial<Omit<AcquisitionTask, 'id' | 'state'>>) => void;
  /** Drop the oldest finished tasks beyond `keep` */
  pruneFinished: (keep: number) => void;
  clear: () => void;
}

export function createAcquisitionStore() {
  return createStore<AcquisitionState>()((set, get) => ({
    tasks: {},

    addTask: (task) => set((s) => ({ tasks: { ...s.tasks, [task.id]: task } })),

    transition: (id, to, patch) => {
      const task = get().tasks[id];
      if (!task || !canTransition(task.state, to)) return false;
      set((s) => ({ tasks: { ...s.tasks, [id]: { ...task, ...patch, id, state: to } } }));
      return true;
    },

    updateTask: (id, patch) => {
      const task = get().tasks[id];
      if (!task) return;
      set((s) => ({ tasks: { ...s.tasks, [id]: { ...task, ...patch } } }));
    },

    pruneFinished: (keep) => {
      const finished = Object.values(get().tasks)
        .filter((t) => isTerminal(t.state))
        .sort((a, b) => (b.finishedAt ?? 0) - (a.finishedAt ?? 0));
      if (finished.length <= keep) return;
      const drop = new Set(finished.slice(keep).map((t) => t.id));
      set((s) => ({
        tasks: Object.fromEntries(Object.entries(s.tasks).filter(([id]) => !drop.has(id))),
      }));
    },

    clear: () => set({ tasks: {} }),
  }));
}

export type AcquisitionStore = ReturnType<typeof createAcquisitionStore>;

const STATE_RANK: Record<TaskState, number> = {
  Active: 0,
  Queued: 1,
  Completed: 2,
  Failed: 2,
  Canceled: 2,
};

/**
 * Queue snapshot for display: active first, then queued in arrival order,
 * then finished tasks, most recent first.
 */
export function orderedTasks(state: Pick<AcquisitionState, 'tasks'>): AcquisitionTask[] {
  return Object.values(state.tasks).sort((a, b) => {
    const rank = STATE_RANK[a.state] - STATE_RANK[b.state];
    if (rank !== 0) return rank;
    if (isTerminal(a.state)) return (b.finishedAt ?? 0) - (a.finishedAt ?? 0);
    return a.queuedAt - b.queuedAt || a.scan.scanStart - b.scan.scanStart;
  });
}
