export {
  chronosConfigFileNames,
  composeJobName,
  createSoaConfigSource,
  readChronosJobsForCluster,
  readServiceChronosConfig,
} from "./reader";
