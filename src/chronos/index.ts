export {
  ChronosApiError,
  ChronosClient,
  type ChronosClientOptions,
  createChronosClient,
  isChronosJob,
} from "./client";
