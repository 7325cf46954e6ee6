/**
 * recolor
 *
 * Regex capture-group colorizing for command output, usable as a library.
 *
 * @packageDocumentation
 */

// ═══════════════════════════════════════════════════════════════
// Version
// ═══════════════════════════════════════════════════════════════
export { VERSION } from './version.js';

// ═══════════════════════════════════════════════════════════════
// Logging (DI boundary)
// ═══════════════════════════════════════════════════════════════
export type { ILogger, LogLevel } from './interfaces/ILogger.js';
export { SilentLogger, LOG_LEVELS, isLogLevel } from './interfaces/ILogger.js';
export { ConsoleLogger } from './outputs/ConsoleLogger.js';
export type { ConsoleLoggerOptions } from './outputs/ConsoleLogger.js';

// ═══════════════════════════════════════════════════════════════
// Models
// ═══════════════════════════════════════════════════════════════
export type { Style, StyleColor, StyleToken, RgbColor } from './models/Style.js';
export {
  EMPTY_STYLE,
  parseStyleToken,
  combineStyles,
  parseStyle,
  applyStyle,
  isEmptyStyle,
  stripStyles,
  describeStyle,
  namedStyle,
  rgbStyle,
} from './models/Style.js';

export type { GroupIdentifier, GroupInfo, GroupStyles, OverrideMap } from './models/GroupInfo.js';

export type { RecolorErrorKind } from './models/RecolorError.js';
export {
  RecolorError,
  InvalidPatternError,
  MalformedOverrideError,
  UnknownStyleTokenError,
  DuplicateOverrideKeyError,
  isRecolorError,
} from './models/RecolorError.js';

export type { NamedColor, Attribute } from './utils/colors.js';

// ═══════════════════════════════════════════════════════════════
// Services
// ═══════════════════════════════════════════════════════════════
export { parseOverride, parseOverrides } from './services/StyleSpecParser.js';
export type { ParsedOverride } from './services/StyleSpecParser.js';

export { PaletteCycler, DEFAULT_PALETTE } from './services/PaletteCycler.js';

export { resolveGroupStyles, styleForGroup } from './services/GroupStyler.js';

export { compilePattern, enumerateGroups } from './services/PatternCompiler.js';
export type { CompiledPattern, CompilePatternOptions } from './services/PatternCompiler.js';

export { colorizeLine, findMatches } from './services/LineColorizer.js';
export type { MatchResult, Span } from './services/LineColorizer.js';

export { ColorizeStream, colorizeStream } from './services/ColorizeStream.js';
export type { ColorizeStreamOptions } from './services/ColorizeStream.js';

// ═══════════════════════════════════════════════════════════════
// Config
// ═══════════════════════════════════════════════════════════════
export { DEFAULT_CONFIG, loadEnvConfig, resolveConfig } from './config/RecolorConfig.js';
export type { RecolorConfig, CliFlags, Env } from './config/RecolorConfig.js';
