import { createStore, type StoreApi } from 'zustand/vanilla';
import type { CubeState, EngineAction, Face, Move, TurnDirection } from '../engine/types';
import { Engine, createEngine } from '../engine/Engine';
import { StateDecodeError, UnknownMoveError } from '../engine/errors';
import { parseAlgorithm } from '../notation/notation';
import { deserializeSession, serializeSession } from '../utils/stateCodec';
import type { RandomSource } from '../engine/scramble';
import { debug } from '../utils/debug';

// =============================================================================
// Store Shape
// =============================================================================

export interface CubeStoreState {
  state: CubeState;
  solved: boolean;
  history: readonly Move[];
  canUndo: boolean;
  canRedo: boolean;
  /** Face the input handler will turn with turnSelected */
  selectedFace: Face | null;
  /** Message from the last rejected action, cleared by the next success */
  lastError: string | null;
}

export interface CubeStoreActions {
  turn: (face: Face, direction: TurnDirection) => boolean;
  turnSelected: (direction: TurnDirection) => boolean;
  selectFace: (face: Face | null) => void;
  runAlgorithm: (notation: string) => boolean;
  undo: () => boolean;
  redo: () => boolean;
  scramble: (length?: number, random?: RandomSource) => boolean;
  reset: () => void;
  loadShareCode: (code: string) => boolean;
  getShareCode: () => string;
}

export type CubeStore = CubeStoreState & CubeStoreActions;

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a store around its own engine. Renderers subscribe to it; every
 * action publishes the engine's post-action snapshot in a single set().
 */
export function createCubeStore(engine: Engine = createEngine()): StoreApi<CubeStore> {
  const snapshotState = () => {
    const { state, solved, history, canUndo, canRedo } = engine.getSnapshot();
    return { state, solved, history, canUndo, canRedo };
  };

  return createStore<CubeStore>()((set, get) => {
    const run = (action: EngineAction, rejection: string): boolean => {
      const ok = engine.dispatch(action);
      debug('store', `${action.type} ${ok ? 'applied' : 'rejected'}`);
      set({ ...snapshotState(), lastError: ok ? null : rejection });
      return ok;
    };

    return {
      ...snapshotState(),
      selectedFace: null,
      lastError: null,

      turn: (face, direction) =>
        run({ type: 'APPLY_MOVE', payload: { face, direction } }, `Cannot turn ${face} ${direction}`),

      turnSelected: (direction) => {
        const face = get().selectedFace;
        if (!face) {
          set({ lastError: 'No face selected' });
          return false;
        }
        return get().turn(face, direction);
      },

      selectFace: (face) => set({ selectedFace: face }),

      runAlgorithm: (notation) => {
        let moves: Move[];
        try {
          moves = parseAlgorithm(notation);
        } catch (error) {
          if (!(error instanceof UnknownMoveError)) throw error;
          set({ lastError: error.message });
          return false;
        }
        return run({ type: 'APPLY_SEQUENCE', payload: { moves } }, `Cannot apply "${notation}"`);
      },

      undo: () => run({ type: 'UNDO' }, 'Nothing to undo'),

      redo: () => run({ type: 'REDO' }, 'Nothing to redo'),

      scramble: (length, random) =>
        run({ type: 'SCRAMBLE', payload: { length, random } }, `Invalid scramble length ${String(length)}`),

      reset: () => {
        run({ type: 'RESET' }, 'Reset failed');
      },

      loadShareCode: (code) => {
        try {
          const { state, history } = deserializeSession(code);
          return run({ type: 'LOAD_STATE', payload: { state, history } }, 'Share code state was rejected');
        } catch (error) {
          if (!(error instanceof StateDecodeError)) throw error;
          set({ lastError: error.message });
          return false;
        }
      },

      getShareCode: () => {
        const { state, history } = get();
        return serializeSession({ state, history: [...history] });
      },
    };
  });
}
