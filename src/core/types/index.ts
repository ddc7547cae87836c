export type {
	CLIOptions,
	Configuration,
	RunOptions,
	RunnerSettings,
} from "./config.js";
export type {
	ChangeQuery,
	ClassifiedPath,
	CommandSpec,
	DispatchPlan,
	PathKind,
	PathSpec,
	SuffixMatchers,
} from "./selection.js";
