export { Coordinator } from './coordinator.js'
export type { SnapshotListener } from './coordinator.js'
export { DEFAULT_DATA_PATH, DEFAULT_LOGIN_PATH, DEFAULT_USER_AGENT, loadConfig, parseConfig } from './config.js'
export type { Config, ConfigInput } from './config.js'
export { describeEntities } from './entities.js'
export type { EntityDescription, EntityState } from './entities.js'
export { DOMObject, request } from './env.js'
export type { RequestOptions, Response, Transport } from './env.js'
export {
	AuthenticationException,
	CancelledException,
	ConfigurationException,
	Exception,
	ExceptionLevel,
	JavaScriptException,
	NetworkException,
	ParserException,
	SessionExpiredException,
} from './exceptions.js'
export { extractField, firstNumber, numericValue, parseCalendarDate, parseTimestamp } from './extractor.js'
export type { FieldDescriptor, FieldShape } from './extractor.js'
export { LogLevel, setLogLevel } from './log.js'
export { AbsencesParserResult, DashboardParserResult, GradesParserResult, Parser, ParserResult } from './parser.js'
export { Session, SessionState } from './session.js'
export type { SessionOptions } from './session.js'
export { average, buildSnapshot, latest, summarizeSubject } from './summary.js'
export type { AbsenceCounters, CalendarDate, Credentials, GradeRecord, Snapshot, SubjectSnapshot } from './types.js'
