export {
	API_ERROR_CODES,
	type ApiErrorCode,
	ContextReleasedError,
	HttpError,
	InvalidPatternError,
	ResponseAlreadyWrittenError,
	StoreLookupError,
	type StoreLookupReason,
	SwitchyardError,
	toError,
} from "./errors";
export { Err, Ok, type Result } from "./result";
