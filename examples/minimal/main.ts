/**
 * Minimal textarea-engine example.
 *
 * Creates a wrapped, editable text area over fixed-advance metrics, feeds
 * it a few key and pointer events through a session, and prints the rows
 * a renderer would draw.
 *
 * Run with:
 *   npm run example
 */

import { FixedAdvanceMetrics } from '../../native/font-metrics';
import { TextArea } from '../../view-model/text-area';
import { EditorSession } from '../../view-model/editor-session';

// --- Setup ---

const metrics = new FixedAdvanceMetrics({ advance: 8 });

const area = new TextArea(metrics, {
  text: 'The quick brown fox jumps over the lazy dog.\nSecond paragraph.',
  width: 160,
  height: 64,
  align: 'justify',
  wholeWords: true,
  edit: true,
  undoLevels: 20,
  colors: [0x202020, { color: 0x2060c0, alpha: 0.8 }],
});

const session = new EditorSession();
session.onEditingFinished((finished, wasEscaped) => {
  console.log(`Editing finished (escaped: ${wasEscaped}): ${JSON.stringify(finished.text)}`);
});

// --- Simulate interaction ---

// Click at the start of the second row, then type.
session.pointerDown(area, { x: 0, y: area.lineHeight, touch: false });
session.pointerUp({ x: 0, y: area.lineHeight, touch: false });
for (const ch of 'very ') {
  session.keyDown({ code: ch.codePointAt(0) ?? 0, special: null, shift: false });
  session.keyUp({ code: ch.codePointAt(0) ?? 0, special: null });
}

// Select to the end of the row and copy it.
session.keyDown({ code: 0, special: 'End', shift: true });
session.keyDown({ code: 0, special: 'Copy', shift: false });
console.log(`Copied: ${JSON.stringify(session.clipboard.text)}`);

// Let the caret blink for half a second.
const state = session.tick(30);
console.log(`Caret visible: ${state?.caretVisible}, scroll: (${state?.scrollX}, ${state?.scrollY})`);

// --- Show the state ---

for (const line of area.renderedLines) {
  console.log(`${String(line.row).padStart(2)} | ${line.content}`);
}
console.log(`Content: ${area.contentWidth} x ${area.contentHeight}, undo levels used: ${area.history.level}`);

session.keyDown({ code: 0, special: 'Escape', shift: false });
