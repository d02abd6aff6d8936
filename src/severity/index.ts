export {
  determineSeverity,
  determineLevel,
  HIGH_SEVERITY_ERROR_TYPES,
} from './classifier.js';
