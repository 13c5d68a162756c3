export { type RegisterFn, RouteGroup } from "./group";
export {
	HTTP_METHODS,
	type HttpMethod,
	type Route,
	RouteHandle,
	type RouteMeta,
	type RouteRegistrar,
} from "./route";
export { type Resolution, RouteTable } from "./route-table";
