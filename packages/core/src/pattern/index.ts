export {
	type MatchResult,
	matchPath,
	matchPattern,
	type ParsedPattern,
	type PatternSegment,
	parsePattern,
	splitPath,
} from "./pattern";
