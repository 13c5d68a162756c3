export { Dispatcher, type DispatcherConfig } from "./dispatcher";
