/**
 * System prompts for external reasoning collaborators.
 */

import { getDiagnosisPrompt } from './diagnosis';

export { getDiagnosisPrompt };
