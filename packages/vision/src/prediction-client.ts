/**
 * Prediction API Client
 *
 * Runs a published iteration against local image bytes.
 */

import { RestTransport } from './http'
import {
  type ImagePrediction,
  ImagePredictionSchema,
  type PredictionClientConfig,
} from './types'

const PREDICTION_API_PATH = '/customvision/v3.0/prediction'

export interface PredictionApi {
  classifyImage(
    projectId: string,
    publishedName: string,
    data: Uint8Array,
  ): Promise<ImagePrediction>
  detectImage(
    projectId: string,
    publishedName: string,
    data: Uint8Array,
  ): Promise<ImagePrediction>
}

export class PredictionClient implements PredictionApi {
  private transport: RestTransport

  constructor(config: PredictionClientConfig) {
    const base = config.endpoint.replace(/\/$/, '')
    this.transport = new RestTransport(
      `${base}${PREDICTION_API_PATH}`,
      { 'Prediction-key': config.predictionKey },
      config.fetch,
    )
  }

  async classifyImage(
    projectId: string,
    publishedName: string,
    data: Uint8Array,
  ): Promise<ImagePrediction> {
    return this.predict('classify', projectId, publishedName, data)
  }

  async detectImage(
    projectId: string,
    publishedName: string,
    data: Uint8Array,
  ): Promise<ImagePrediction> {
    return this.predict('detect', projectId, publishedName, data)
  }

  private async predict(
    kind: 'classify' | 'detect',
    projectId: string,
    publishedName: string,
    data: Uint8Array,
  ): Promise<ImagePrediction> {
    return this.transport.request(
      `/${encodeURIComponent(projectId)}/${kind}/iterations/${encodeURIComponent(publishedName)}/image`,
      'POST',
      ImagePredictionSchema,
      { kind: 'binary', value: data },
    )
  }
}

/**
 * Create a prediction client with the default fetch
 */
export function createPredictionClient(
  endpoint: string,
  predictionKey: string,
): PredictionClient {
  return new PredictionClient({ endpoint, predictionKey })
}
