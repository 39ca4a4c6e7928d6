export {
  BlueprintScript,
  DEFAULT_BLUEPRINT_SCRIPT_CONFIG,
  type BlueprintScriptConfig,
  type PrintSink,
  type ScriptState,
} from './BlueprintScript'
export { DEFAULT_SCREEN_LOG_CONFIG, ScreenLog, type ScreenLogConfig } from './ScreenLog'
