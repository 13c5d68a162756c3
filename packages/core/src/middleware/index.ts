export { chain, compose, type Handler, type Middleware, when } from "./compose";
