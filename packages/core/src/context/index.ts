export { Context, ContextState } from "./context";
export { ContextPool, type ContextPoolConfig } from "./pool";
export type { HeaderMap, NativeHandles, RequestDescriptor, ResponseDescriptor } from "./types";
export { parseRequestTarget, type RequestTarget } from "./target";
