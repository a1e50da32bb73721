export { FindHospitalsTool } from './find-hospitals-tool.js';
export type {
  Hospital,
  HospitalDirectory,
  HospitalQuery,
  HospitalSearchResult,
  OpenStreetMapDirectoryOptions,
} from './hospital-directory.js';
export { LocationNotFoundError, OpenStreetMapHospitalDirectory, haversineKm } from './hospital-directory.js';
export { KnowledgeSearchTool, NO_RESULTS_MESSAGE } from './knowledge-search-tool.js';
export type { KnowledgeSearchOptions } from './knowledge-search-tool.js';
export type { ConditionAssessment, ConditionRuleSet } from './predict-conditions-tool.js';
export {
  PredictConditionsTool,
  assessConditions,
  classifyDuration,
  classifySeverity,
  loadConditionRules,
} from './predict-conditions-tool.js';
