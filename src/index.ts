export {
  Logger, type ConsoleEvent, type ConsoleLog, type LogLevel, type LogFilter, type LogSubscriber, type ScopedLogger,
} from './console/core/Logger';
export {
  ShellCommandError, ConfigTreeError, PagerError, ERROR_PREFIX, errorMessage, formatUserError,
} from './console/core/errors';
export {
  loadConsoleConfig, DEFAULT_CONFIG, DEFAULT_PAGER,
  type ConsoleConfig, type ConsoleConfigOverrides, type PagerOptions,
} from './console/core/config';

export {
  ConfigTree, type ConfigNode, type ConfigNodeInit, type ConfigNodeKind, type ConfigNodeSpec, type NodeId,
} from './console/data/ConfigTree';
export { childValue, childOptValue, findNodes, MISSING_VALUE } from './console/data/accessors';
export { flattenConfig, isCommandNode, ENTRY_SEPARATOR, INDENT_UNIT } from './console/data/ConfigFlattener';
export { printData, parseDataFormat, type DataFormat } from './console/data/DataPrinter';

export {
  CommandTrie, enumerateCommands, renderTokenName,
  type CommandAction, type CommandContext, type CommandToken, type ParsedArgs, type TokenId, type TokenKind,
} from './console/shell/CommandTrie';
export { Commands } from './console/shell/Commands';
export {
  OPERATIONAL, enterConfigure, enterNested, exitConfigLevel, listRoots, modeDataPath, modeToken,
  type ModeContext, type NestingEntry,
} from './console/shell/ModeContext';
export {
  Session, parseConfigurationType,
  type ConfigBackend, type ConfigurationType, type YangModuleInfo,
} from './console/shell/Session';
export { ManagementShell, type ManagementShellOptions } from './console/shell/ManagementShell';
export { enterConfigNode, getArg, getOptArg } from './console/shell/commands/InternalCommands';

export { diffConfigurations, unifiedDiff, DIFF_CONTEXT_RADIUS } from './console/output/ConfigDiff';
export { pageOutput, stdoutTerminal, type Terminal } from './console/output/Pager';
export { Table, pageTable } from './console/output/Table';
