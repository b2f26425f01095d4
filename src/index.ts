export type {
	AutomationDriver,
	DriverLaunchOptions,
	DriverLauncher,
	ReadyState,
} from "./browser/driver.js";
export { firstVisible } from "./browser/driver.js";
export {
	DEFAULT_TUNABLES,
	ListExtractionEngine,
	resolveTunables,
} from "./browser/list-extractor.js";
export { LoginFlow, type LoginFlowOptions, type LoginState } from "./browser/login-flow.js";
export { PlaywrightDriver, launchPlaywrightDriver } from "./browser/playwright-driver.js";
export type { ListOptions, RelationshipClient } from "./client/client.js";
export {
	DEFAULT_TIMEOUT_MS,
	Session,
	type SessionOptions,
	openSession,
	withSession,
} from "./client/session.js";
export { extractCountText, parseCountText } from "./lib/count-text.js";
export {
	ConfigurationError,
	HarvestError,
	LoginError,
	type LoginFailureReason,
	ParseError,
	SessionClosedError,
	WaitTimeoutError,
} from "./lib/errors.js";
export {
	createConsoleLogger,
	type LogFields,
	type Logger,
	silentLogger,
} from "./lib/logger.js";
export {
	DEFAULT_SELECTORS_FILE,
	type KeywordGroup,
	SelectorStore,
	type SelectorName,
} from "./lib/selectors.js";
export { type Clock, systemClock } from "./lib/timing.js";
export type {
	Credentials,
	ExtractionRequest,
	ExtractionResult,
	ExtractionTunables,
	ListKind,
	SessionState,
	StopReason,
} from "./lib/types.js";
