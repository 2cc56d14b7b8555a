/**
 * Tagged debug log for the engine and store.
 *
 *   enableDebugTag('move');
 *   debug('move', 'front:cw');   // recorded
 *   debug('store', 'UNDO');      // dropped, tag inactive
 *   getDebug();                  // "[12:00:00.000] [move] front:cw"
 */

export type DebugTag = 'registry' | 'move' | 'sequence' | 'preview' | 'scramble' | 'store';

/** Oldest lines are dropped past this many */
const MAX_LINES = 2000;

let lines: string[] = [];
const activeTags = new Set<DebugTag>();

const appendLine = (line: string): void => {
  lines.push(line);
  if (lines.length > MAX_LINES) {
    lines = lines.slice(lines.length - MAX_LINES);
  }
};

export const debug = (tag: DebugTag, content: string): void => {
  if (!activeTags.has(tag)) return;

  const timestamp = new Date().toISOString().slice(11, 23); // HH:MM:SS.mmm
  appendLine(`[${timestamp}] [${tag}] ${content}`);
};

export const enableDebugTag = (tag: DebugTag): void => {
  activeTags.add(tag);
};

export const disableDebugTag = (tag: DebugTag): void => {
  activeTags.delete(tag);
};

/** Replaces the active set */
export const setDebugTags = (tags: readonly DebugTag[]): void => {
  activeTags.clear();
  tags.forEach((tag) => activeTags.add(tag));
};

export const getDebugTags = (): DebugTag[] => Array.from(activeTags);

/** Recorded regardless of tags; used for rejected actions */
export const appendDebug = (content: string): void => {
  appendLine(content);
};

export const getDebug = (): string => lines.join('\n');

export const clearDebug = (): void => {
  lines = [];
};
