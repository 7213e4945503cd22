import { FraudDetectionResponse, type FraudDetection } from '../../contracts/responses';
import type { PipelineStep } from '../types';
import { StepDependencies, recordUsage, requirePrompt, withDocument } from './shared';

export function createDetectFraudStep({ prompts }: StepDependencies): PipelineStep<FraudDetection> {
  return {
    name: 'DetectFraud',
    order: 500,
    contract: FraudDetectionResponse,

    shouldExecute: (state) => state.invoice !== undefined,

    async preparePrompt(state, document) {
      state.logStep('DetectFraud', 'Checking the document for signs of tampering', 'InProgress');
      return withDocument(state, document, requirePrompt(prompts, 'fraud-detection', FraudDetectionResponse));
    },

    processResponse(state, response) {
      const result = response.data;
      state.fraudAnalysis = result;
      recordUsage(state, 'FraudDetection', response);

      if (!result.possibleFraud) {
        state.logStep('DetectFraud', 'No signs of tampering found', 'Success');
        return;
      }

      const indicators = result.visualIndicators ?? [];
      const detail =
        result.visualEvidence ??
        (indicators.length > 0 ? indicators.join('; ') : 'Visual indicators of tampering');
      state.addIssue('PossibleFraud', detail, 'Warning');
      state.setOutcome('NeedsReview', 'The document shows possible signs of tampering and needs manual review');
      state.logStep('DetectFraud', `Possible fraud detected (confidence ${result.confidence})`, 'Warning');
    },
  };
}
