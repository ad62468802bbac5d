export { subjectModifiers } from './subject-modifiers.js';
export { subjectHatchProgress } from './subject-hatch-progress.js';
