// Core types and interfaces
export type { OutputFormat, Segment, TranscriptFormatter, ParsedFormatList } from './types.js';

// Timestamp utilities
export { formatTimestamp, formatSeconds, toWholeMilliseconds } from './timecode.js';
export type { TimestampStyle } from './timecode.js';

// Formatter implementations
export { JsonFormatter } from './JsonFormatter.js';
export { SrtFormatter } from './SrtFormatter.js';
export { VttFormatter } from './VttFormatter.js';
export { TsvFormatter } from './TsvFormatter.js';
export { TextFormatter } from './TextFormatter.js';

// Formatter registry
export { FormatterRegistry } from './FormatterRegistry.js';
