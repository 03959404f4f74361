// Async sources (highlighter, prompt)
export {
	type AsyncSource,
	constPrompt,
	type Highlighted,
	type Highlighter,
	LateUpdates,
	type Prompt,
	plainHighlighter,
} from "./async-source.js";
// Text buffer
export { CodeBuffer, isCodepointBoundary, nextBoundary, previousBoundary } from "./code-buffer.js";
// Components
export {
	type Abbreviations,
	applyPending,
	CodeArea,
	type CodeAreaConfig,
	type CodeAreaState,
	copyCodeAreaState,
	type PendingCode,
	type ResolvedCodeAreaConfig,
	resolveCodeAreaConfig,
} from "./components/code-area.js";
export {
	type ListingItem,
	ListingWidget,
	type ListingWidgetOptions,
	modeLine,
	renderListing,
	writeListing,
} from "./components/listing.js";
// Diagnostics
export { DEBUG_LOG_ENV, debugLog } from "./debug.js";
export { Guarded } from "./guarded.js";
export { AsyncHighlighter, type AsyncHighlighterOptions, type HighlightFunction } from "./highlighter.js";
// Keybindings
export {
	type CodeAreaAction,
	CodeAreaKeybindings,
	type CodeAreaKeybindingsConfig,
	createCodeAreaBindings,
	DEFAULT_CODE_AREA_KEYBINDINGS,
	DEFAULT_LISTING_KEYBINDINGS,
	type KeybindingsConfig,
	KeybindingsManager,
	type ListingAction,
	ListingKeybindings,
	type ListingKeybindingsConfig,
} from "./keybindings.js";
// Keyboard input handling
export {
	charKey,
	decodeKey,
	type FunctionKeyName,
	functionKey,
	isFunctionKey,
	type Key,
	type KeyId,
	keyEvent,
	keyId,
	MODIFIERS,
	matchesKey,
	pasteEvent,
	type TermEvent,
} from "./keys.js";
export { AsyncPrompt, type AsyncPromptOptions } from "./prompt.js";
export { quoteShell } from "./quote.js";
// Rendering
export {
	BufferBuilder,
	type Cell,
	CURSOR_MARKER,
	type Pos,
	RenderBuffer,
	type ToLinesOptions,
	truncateToHeight,
} from "./render-buffer.js";
export {
	applyStyle,
	concat,
	mergeStyle,
	parseStyle,
	partition,
	plain,
	STYLE_FLAGS,
	type Segment,
	type Style,
	type StyledText,
	type StyleFlag,
	styled,
	styledWidth,
	styleEquals,
	toPlain,
	transform,
} from "./styled.js";
// Input buffering for batch splitting
export { TermReader, type TermReaderEventMap, type TermReaderOptions } from "./term-reader.js";
// Utilities
export { graphemes, isGraphic, truncateToWidth, visibleWidth } from "./utils.js";
export { addOverlayHandler, dummyHandler, funcHandler, type Handler, OverlayWidget, type Renderer, type Widget } from "./widget.js";
