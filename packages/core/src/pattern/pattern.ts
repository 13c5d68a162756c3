import { InvalidPatternError } from "../result/errors";

// ---------------------------------------------------------------------------
// Pattern Matcher: path patterns with `:param` and trailing `*wildcard`
// ---------------------------------------------------------------------------

/** One `/`-delimited unit of a route pattern. */
export type PatternSegment =
	| { readonly kind: "literal"; readonly value: string }
	| { readonly kind: "param"; readonly name: string }
	| { readonly kind: "wildcard"; readonly name: string };

/**
 * A route pattern parsed once at registration.
 *
 * `positional` holds every segment except the trailing wildcard, which is
 * kept apart in `wildcard` because it consumes a variable number of path
 * segments.
 */
export interface ParsedPattern {
	readonly raw: string;
	readonly segments: readonly PatternSegment[];
	readonly positional: readonly PatternSegment[];
	readonly wildcard: string | undefined;
	/** True when every segment is a literal. */
	readonly isStatic: boolean;
}

/** Outcome of matching a path against a pattern. */
export interface MatchResult {
	matched: boolean;
	params: Record<string, string>;
}

/**
 * Split a path into segments, ignoring leading and trailing slashes.
 *
 * An empty or all-slash path has zero segments. Inner empty segments
 * (`/a//b`) are preserved.
 */
export function splitPath(path: string): string[] {
	let start = 0;
	let end = path.length;
	while (start < end && path.charCodeAt(start) === 47) start++;
	while (end > start && path.charCodeAt(end - 1) === 47) end--;
	if (start === end) return [];
	return path.slice(start, end).split("/");
}

function noMatch(): MatchResult {
	return { matched: false, params: {} };
}

function parseSegment(part: string): PatternSegment {
	if (part.startsWith(":")) return { kind: "param", name: part.slice(1) };
	if (part.startsWith("*")) return { kind: "wildcard", name: part.slice(1) };
	return { kind: "literal", value: part };
}

/**
 * Parse a route pattern.
 *
 * @throws InvalidPatternError when a wildcard appears anywhere but the last segment.
 */
export function parsePattern(raw: string): ParsedPattern {
	const segments = splitPath(raw).map(parseSegment);
	const wildcardIndex = segments.findIndex((s) => s.kind === "wildcard");

	if (wildcardIndex !== -1 && wildcardIndex !== segments.length - 1) {
		throw new InvalidPatternError(
			`Wildcard must be the final segment of a pattern: "${raw}"`,
		);
	}

	const last = segments[segments.length - 1];
	const wildcard = last?.kind === "wildcard" ? last.name : undefined;
	const positional = wildcard === undefined ? segments : segments.slice(0, -1);

	return {
		raw,
		segments,
		positional,
		wildcard,
		isStatic: segments.every((s) => s.kind === "literal"),
	};
}

/**
 * Match a request path against a parsed pattern.
 *
 * Literal segments compare case-sensitively, `:name` binds one segment,
 * and a trailing `*name` binds the remaining segments joined by `/`
 * (the empty string when nothing remains). A repeated parameter name
 * keeps the last binding.
 */
export function matchPattern(pattern: ParsedPattern, path: string): MatchResult {
	if (pattern.isStatic && pattern.raw === path) {
		return { matched: true, params: {} };
	}

	const parts = splitPath(path);
	const { positional, wildcard } = pattern;

	if (wildcard === undefined) {
		if (parts.length !== positional.length) return noMatch();
	} else if (parts.length < positional.length) {
		return noMatch();
	}

	const params: Record<string, string> = {};
	for (let i = 0; i < positional.length; i++) {
		const segment = positional[i];
		const part = parts[i];
		if (segment === undefined || part === undefined) return noMatch();

		if (segment.kind === "param") {
			params[segment.name] = part;
		} else if (segment.kind === "literal" && segment.value !== part) {
			return noMatch();
		}
	}

	if (wildcard !== undefined) {
		params[wildcard] = parts.slice(positional.length).join("/");
	}

	return { matched: true, params };
}

/** Parse `pattern` and match `path` against it in one call. */
export function matchPath(pattern: string, path: string): MatchResult {
	return matchPattern(parsePattern(pattern), path);
}
