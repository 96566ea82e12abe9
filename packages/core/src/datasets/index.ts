export {
  packageDatasets,
  datasetToCsv,
  columnTitle,
  placeholderName,
  DEFAULT_DATASET_EXTENSION,
} from './dataset-packager.js';
export { toCsv } from './csv.js';
export type {
  DatasetLookup,
  DatasetPackage,
  DatasetSkip,
  DatasetSkipReason,
  PackageOptions,
} from './dataset-packager.js';
