export { serve } from './serve.js';
export { ask, formatCitations } from './ask.js';
export { documents } from './documents.js';
export { models, formatModel } from './models.js';
export { diagnose, checkModel } from './diagnose.js';
export { resolveSettings, reportError } from './settings.js';
