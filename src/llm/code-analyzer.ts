/**
 * Gateway-backed Code Analyzer
 *
 * Finds errors in a code submission through the model gateway's
 * `code_analysis` prompt kind.
 */

import {
  AnalyzerUnavailableError,
  type CallOptions,
  type CodeAnalysisRequest,
  type CodeAnalyzer,
  type ModelGateway,
} from '../core/gateway';
import type { CodeAnalysis } from '../core/models';
import { parseCodeAnalysisResponse } from './prompts';

export class GatewayCodeAnalyzer implements CodeAnalyzer {
  constructor(private readonly gateway: ModelGateway) {}

  /**
   * @throws AnalyzerUnavailableError when the gateway fails or the response
   *   does not describe a valid analysis
   */
  async analyze(request: CodeAnalysisRequest, options: CallOptions = {}): Promise<CodeAnalysis> {
    try {
      const response = await this.gateway.generate(
        'code_analysis',
        { code: request.code, language: request.language },
        options
      );
      return parseCodeAnalysisResponse(response);
    } catch (error) {
      const reason = error instanceof Error ? error.message : 'unknown error';
      throw new AnalyzerUnavailableError(`Code analysis failed: ${reason}`, error);
    }
  }
}
