import { compressToEncodedURIComponent, decompressFromEncodedURIComponent } from 'lz-string';
import { ALL_FACES, FACELET_COUNT, type Color, type CubeState, type Face, type Move } from '../engine/types';
import { createState } from '../engine/cubeState';
import { StateDecodeError, UnknownMoveError } from '../engine/errors';
import { SOLVED_FACE_COLORS } from '../config/colors';
import { SHARE_CODE_VERSION } from '../config/defaults';
import { formatAlgorithm, parseAlgorithm } from '../notation/notation';

// Facelet strings name each sticker by the face that shows its color when solved
const FACE_LETTER: Readonly<Record<Face, string>> = {
  up: 'U',
  down: 'D',
  front: 'F',
  back: 'B',
  left: 'L',
  right: 'R',
};

const LETTER_TO_COLOR = new Map<string, Color>(
  ALL_FACES.map((face) => [FACE_LETTER[face], SOLVED_FACE_COLORS[face]])
);

const COLOR_TO_LETTER = new Map<Color, string>(
  ALL_FACES.map((face) => [SOLVED_FACE_COLORS[face], FACE_LETTER[face]])
);

// Compact serialization format for share codes
interface SerializedSession {
  v: number;  // Version for future compatibility
  s: string;  // Facelet string
  h?: string; // History in move notation, omitted when empty
}

export interface SessionData {
  state: CubeState;
  history: Move[];
}

/**
 * 24 letters in canonical address order, e.g. the solved cube is
 * "UUUUDDDDFFFFBBBBLLLLRRRR".
 */
export const encodeFacelets = (state: CubeState): string =>
  state.facelets.map((color) => COLOR_TO_LETTER.get(color) ?? '?').join('');

export const decodeFacelets = (text: string): CubeState => {
  if (text.length !== FACELET_COUNT) {
    throw new StateDecodeError(`Facelet string must have ${FACELET_COUNT} letters, got ${text.length}`);
  }
  const colors = Array.from(text, (letter, index) => {
    const color = LETTER_TO_COLOR.get(letter);
    if (!color) {
      throw new StateDecodeError(`Unknown facelet letter "${letter}" at ${index}`);
    }
    return color;
  });
  return createState(colors);
};

export const serializeSession = (session: SessionData): string => {
  const payload: SerializedSession = {
    v: SHARE_CODE_VERSION,
    s: encodeFacelets(session.state),
  };
  if (session.history.length > 0) {
    payload.h = formatAlgorithm(session.history);
  }
  return compressToEncodedURIComponent(JSON.stringify(payload));
};

const isSerializedSession = (value: unknown): value is SerializedSession => {
  if (typeof value !== 'object' || value === null) return false;
  if (!('v' in value) || !('s' in value)) return false;
  const h = 'h' in value ? value.h : undefined;
  return typeof value.v === 'number' && typeof value.s === 'string' && (h === undefined || typeof h === 'string');
};

export const deserializeSession = (code: string): SessionData => {
  const json = decompressFromEncodedURIComponent(code);
  if (!json) {
    throw new StateDecodeError('Share code could not be decompressed');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    throw new StateDecodeError('Share code does not contain valid JSON');
  }

  if (!isSerializedSession(parsed)) {
    throw new StateDecodeError('Share code has an unexpected shape');
  }
  if (parsed.v !== SHARE_CODE_VERSION) {
    throw new StateDecodeError(`Unsupported share code version ${parsed.v}`);
  }

  let history: Move[] = [];
  if (parsed.h) {
    try {
      history = parseAlgorithm(parsed.h);
    } catch (error) {
      if (error instanceof UnknownMoveError) {
        throw new StateDecodeError(`Share code history is invalid: ${error.message}`);
      }
      throw error;
    }
  }

  return { state: decodeFacelets(parsed.s), history };
};
