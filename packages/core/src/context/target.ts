// ---------------------------------------------------------------------------
// Request target: path and query taken from the raw request line
// ---------------------------------------------------------------------------

/** Path and query of a request target. */
export interface RequestTarget {
	/** Raw (still percent-encoded) path, `/` when the target has none. */
	readonly path: string;
	readonly query: URLSearchParams;
}

const ABSOLUTE_FORM = /^[a-z][a-z\d+.-]*:\/\//i;

/**
 * Split a request target into path and query.
 *
 * Origin-form targets (`/users/42?full=1`) are read as text, so a target
 * starting with `//` stays a path and never becomes an authority. For an
 * absolute-form target (`http://host/users/42`) the scheme and authority
 * are dropped first. The fragment, if any, is ignored.
 */
export function parseRequestTarget(raw: string): RequestTarget {
	let rest = raw;
	const scheme = ABSOLUTE_FORM.exec(rest);
	if (scheme) {
		const pathStart = rest.slice(scheme[0].length).search(/[/?#]/);
		rest = pathStart === -1 ? "" : rest.slice(scheme[0].length + pathStart);
	}

	const hash = rest.indexOf("#");
	if (hash !== -1) rest = rest.slice(0, hash);

	const mark = rest.indexOf("?");
	const path = mark === -1 ? rest : rest.slice(0, mark);
	const search = mark === -1 ? "" : rest.slice(mark + 1);

	return {
		path: path === "" ? "/" : path,
		query: new URLSearchParams(search),
	};
}
