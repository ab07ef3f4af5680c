export type {
  PropertyName,
  CommandFieldDef,
  EntityRegistration,
  EntityGroup,
  RegistrationResult,
  PairResult,
  StateChangeCallback,
  RegistrationChangeCallback,
  Adapter,
  AdapterFactory,
} from "./types.js";

export type {
  ParentMessage,
  InitMessage,
  ObserveMessage,
  ExecuteMessage,
  PingMessage,
  PairMessage,
  ShutdownMessage,
  ChildMessage,
  ReadyMessage,
  ObserveResultMessage,
  ExecuteResultMessage,
  StateChangedMessage,
  EntitiesChangedMessage,
  PongMessage,
  ErrorMessage,
  LogMessage,
  PairResultMessage,
} from "./protocol.js";

export { PROTOCOL_VERSION, decodeParentMessage } from "./protocol.js";

export { runAdapter, AdapterHarness, formatLogArgs, type HarnessIO } from "./harness.js";
