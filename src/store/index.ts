import { Logger, StatsAggregator } from "../observability";
import { FileArtifactStore } from "./fileArtifactStore";
import { ArtifactStore } from "./types";

export function createStore(
  config: { outputDir: string; verifyArtifactsOnStartup: boolean },
  logger: Logger,
  stats?: StatsAggregator,
): ArtifactStore {
  return new FileArtifactStore({
    outputDir: config.outputDir,
    verifyArtifactsOnStartup: config.verifyArtifactsOnStartup,
    logger,
    stats,
  });
}

export * from "./fileArtifactStore";
export * from "./keyedMutex";
export * from "./types";
