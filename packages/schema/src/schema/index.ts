export {
  GameConfigSchema,
  GameConfigError,
  parseGameConfig,
  safeParseGameConfig,
  formatConfigIssues,
  defaultGameConfig,
  easyGameConfig,
  hardGameConfig,
  clampBet,
  type ParsedGameConfig,
} from "./game-config.js";
