export {
	type AsyncErrorReporter,
	type ConnectionEvent,
	type EventHandler,
	type EventKind,
	EventPipeline,
	type EventPipelineConfig,
	type LifecycleEventMap,
	LifecyclePipeline,
	type ServerEvent,
} from "./pipeline";
