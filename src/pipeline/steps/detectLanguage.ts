import { LanguageDetectionResponse, type LanguageDetection } from '../../contracts/responses';
import type { PipelineStep } from '../types';
import { StepDependencies, recordUsage, requirePrompt, withDocument } from './shared';

export function createDetectLanguageStep({ prompts }: StepDependencies): PipelineStep<LanguageDetection> {
  return {
    name: 'DetectLanguage',
    order: 100,
    contract: LanguageDetectionResponse,

    shouldExecute: () => true,

    async preparePrompt(state, document) {
      state.logStep('DetectLanguage', 'Detecting document language', 'InProgress');
      return withDocument(
        state,
        document,
        requirePrompt(prompts, 'language-detection', LanguageDetectionResponse)
      );
    },

    processResponse(state, response) {
      const { languageName, languageCode } = response.data;
      state.language = response.data;
      state.logStep('DetectLanguage', `Detected language: ${languageName} (${languageCode})`, 'Success');
      recordUsage(state, 'LanguageDetection', response);
    },
  };
}
