export { registerRecordCommand } from './record.js';
export { registerCompareCommand } from './compare.js';
export { registerPriorCommands } from './priors.js';
export { registerCalibrationCommands } from './calibration.js';
export { registerReportCommands } from './report.js';
export { registerVerifyCommand } from './verify.js';
