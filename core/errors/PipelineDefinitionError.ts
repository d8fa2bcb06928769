import { PipeshellError } from './PipeshellError';

export interface PipelineDefinitionDetails extends Record<string, unknown> {
  file?: string;
  /** Location of the offending entry, e.g. `steps[2].split.left[0]` */
  entry?: string;
}

/**
 * Error thrown when a pipeline definition file cannot be turned into stages
 */
export class PipelineDefinitionError extends PipeshellError {
  declare readonly details: PipelineDefinitionDetails;

  constructor(message: string, location: PipelineDefinitionDetails) {
    super(location.entry ? `${location.entry}: ${message}` : message, {
      code: 'INVALID_PIPELINE_DEFINITION',
      details: { ...location }
    });
  }
}
