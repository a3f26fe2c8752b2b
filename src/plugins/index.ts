import {
  createRegistries,
  type PluginRegistries,
} from "@/services/pluginRegistry";
import { intervalAnnotator } from "@/plugins/annotators/interval";
import { peakAnnotator } from "@/plugins/annotators/peak";
import { thresholdAnnotator } from "@/plugins/annotators/threshold";
import { summaryStats } from "@/plugins/compute/summaryStats";
import { builtinProcessors } from "@/plugins/processors";

export const builtinAnnotators = [
  thresholdAnnotator,
  peakAnnotator,
  intervalAnnotator,
];

export const builtinComputes = [summaryStats];

/**
 * Registries pre-populated with every built-in plugin
 */
export function createBuiltinRegistries(): PluginRegistries {
  const registries = createRegistries();
  registries.processors.registerMany(builtinProcessors);
  registries.annotators.registerMany(builtinAnnotators);
  registries.computes.registerMany(builtinComputes);
  return registries;
}

export {
  builtinProcessors,
  intervalAnnotator,
  peakAnnotator,
  summaryStats,
  thresholdAnnotator,
};
