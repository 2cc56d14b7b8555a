/**
 * Engine - Session owner for one cube
 *
 * The Engine:
 * - Owns a FaceletStore (the only mutable holder of cube state)
 * - Processes actions (command pattern)
 * - Keeps the move history for undo/redo
 * - Supports previews: a working copy that is committed or discarded whole
 *
 * A rejected action returns false and leaves the state untouched.
 */

import type { Color, CubeState, EngineAction, EngineSnapshot, Face, Move } from './types';
import { FaceletStore, createSolvedState } from './cubeState';
import { applySequence, faceletColor } from './executor';
import { invertMove, toMove } from './moves';
import { generateScramble } from './scramble';
import { InvalidStateError, ScrambleLengthError, UnknownMoveError } from './errors';
import { parseAlgorithm } from '../notation/notation';
import { appendDebug, debug } from '../utils/debug';

interface SessionTrack {
  store: FaceletStore;
  history: Move[];
  redo: Move[];
}

const cloneTrack = (track: SessionTrack): SessionTrack => ({
  store: track.store.clone(),
  history: track.history.slice(),
  redo: track.redo.slice(),
});

/** Errors that mean "bad input", as opposed to a defect in the engine */
const isRejection = (error: unknown): error is Error =>
  error instanceof UnknownMoveError ||
  error instanceof InvalidStateError ||
  error instanceof ScrambleLengthError;

export class Engine {
  private _main: SessionTrack;
  private _preview: SessionTrack | null = null;

  constructor(initial: CubeState = createSolvedState()) {
    this._main = { store: new FaceletStore(initial), history: [], redo: [] };
  }

  // ==========================================================================
  // Preview Management
  // ==========================================================================

  /**
   * Start a preview by cloning the current session.
   * Subsequent dispatches modify the preview until it is committed or discarded.
   */
  startPreview(): void {
    if (this._preview) {
      console.warn('Preview already active, discarding previous preview');
    }
    this._preview = cloneTrack(this._main);
    debug('preview', 'started');
  }

  commitPreview(): void {
    if (this._preview) {
      this._main = this._preview;
      this._preview = null;
      debug('preview', 'committed');
    }
  }

  discardPreview(): void {
    if (this._preview) {
      this._preview = null;
      debug('preview', 'discarded');
    }
  }

  hasPreview(): boolean {
    return this._preview !== null;
  }

  private getActiveTrack(): SessionTrack {
    return this._preview ?? this._main;
  }

  // ==========================================================================
  // State Access
  // ==========================================================================

  /** Current state of the active session (preview if one is open) */
  get state(): CubeState {
    return this.getActiveTrack().store.snapshot();
  }

  /** Committed state, ignoring any open preview */
  get committedState(): CubeState {
    return this._main.store.snapshot();
  }

  get history(): readonly Move[] {
    return this.getActiveTrack().history.slice();
  }

  isSolved(): boolean {
    return this.getActiveTrack().store.isSolved();
  }

  faceletColor(face: Face, row: number, col: number): Color {
    return faceletColor(this.state, face, row, col);
  }

  getSnapshot(): EngineSnapshot {
    const track = this.getActiveTrack();
    return {
      state: track.store.snapshot(),
      solved: track.store.isSolved(),
      history: track.history.slice(),
      canUndo: track.history.length > 0,
      canRedo: track.redo.length > 0,
      previewing: this._preview !== null,
    };
  }

  // ==========================================================================
  // Action Dispatch
  // ==========================================================================

  /**
   * Dispatch an action.
   *
   * @param action - The action to dispatch
   * @param options - `preview: false` targets the committed session even while a preview is open
   * @returns true if the state changed as requested
   */
  dispatch(action: EngineAction, options?: { preview?: boolean }): boolean {
    const track = options?.preview === false ? this._main : this.getActiveTrack();

    try {
      return this.handle(track, action);
    } catch (error) {
      if (!isRejection(error)) throw error;
      console.warn(`${action.type} rejected: ${error.message}`);
      appendDebug(`[${new Date().toISOString()}] ${action.type} rejected: ${error.message}`);
      return false;
    }
  }

  private handle(track: SessionTrack, action: EngineAction): boolean {
    switch (action.type) {
      case 'APPLY_MOVE':
        this.play(track, [toMove(action.payload)]);
        return true;

      case 'APPLY_SEQUENCE':
        this.play(track, action.payload.moves.map(toMove));
        return true;

      case 'APPLY_ALGORITHM':
        this.play(track, parseAlgorithm(action.payload.notation));
        return true;

      case 'UNDO': {
        const last = track.history.pop();
        if (!last) return false;
        track.store.setAll(applySequence(track.store.snapshot(), [invertMove(last)]));
        track.redo.push(last);
        return true;
      }

      case 'REDO': {
        const next = track.redo.pop();
        if (!next) return false;
        track.store.setAll(applySequence(track.store.snapshot(), [next]));
        track.history.push(next);
        return true;
      }

      case 'SCRAMBLE': {
        const moves = generateScramble(action.payload?.length, action.payload?.random);
        this.replace(track, applySequence(track.store.snapshot(), moves));
        return true;
      }

      case 'RESET':
        this.replace(track, createSolvedState());
        return true;

      case 'LOAD_STATE': {
        const history = (action.payload.history ?? []).map(toMove);
        this.replace(track, action.payload.state);
        track.history = history;
        return true;
      }
    }
  }

  /** Apply moves as one unit and record them; nothing is written until both are ready */
  private play(track: SessionTrack, moves: readonly Move[]): void {
    const next = applySequence(track.store.snapshot(), moves);
    const history = track.history.concat(moves);
    track.store.setAll(next);
    track.history = history;
    track.redo = [];
  }

  /** Swap in an unrelated state; history no longer leads to it */
  private replace(track: SessionTrack, state: CubeState): void {
    track.store.setAll(state);
    track.history = [];
    track.redo = [];
  }
}

export function createEngine(initial?: CubeState): Engine {
  return new Engine(initial);
}
