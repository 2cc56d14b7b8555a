export * from './engine';
export { parseAlgorithm, parseMove, formatMove, formatAlgorithm } from './notation/notation';
export {
  getFaceFrame,
  getStickerPlacement,
  getStickerCorners,
  getFaceAxis,
  getTurnRotation,
  isInTurnLayer,
  rotatePlacement,
  findAddressAt,
} from './geometry/stickerLayout';
export type { FaceFrame, StickerPlacement, Axis } from './geometry/stickerLayout';
export { encodeFacelets, decodeFacelets, serializeSession, deserializeSession } from './utils/stateCodec';
export type { SessionData } from './utils/stateCodec';
export { createCubeStore } from './store/cubeStore';
export type { CubeStore, CubeStoreState, CubeStoreActions } from './store/cubeStore';
export { SOLVED_FACE_COLORS, getColors, stickerHex } from './config/colors';
export type { ColorConfig } from './config/colors';
export { DEFAULT_CONFIG } from './config/defaults';
export {
  debug,
  enableDebugTag,
  disableDebugTag,
  setDebugTags,
  getDebugTags,
  getDebug,
  clearDebug,
} from './utils/debug';
export type { DebugTag } from './utils/debug';
