/**
 * Provider construction from project config.
 *
 * Constructors only record settings; models load (and optional packages are
 * imported) on first initialize().
 */

import type {CodeloupeConfig} from '../lib/config.js';
import type {Logger} from '../lib/logger.js';
import {ColbertTokenEncoder} from './colbert.js';
import {FastEmbedProvider} from './fastembed.js';
import {OllamaEmbeddingProvider} from './ollama.js';
import {OpenAIEmbeddingProvider} from './openai.js';
import type {EmbeddingProvider, TokenEncoder} from './types.js';

export type {EmbeddingProvider, TokenEncoder, ModelProgressCallback} from './types.js';

export function createEmbeddingProvider(
	config: CodeloupeConfig,
	logger?: Logger,
): EmbeddingProvider {
	switch (config.embeddingProvider) {
		case 'local':
			return new FastEmbedProvider(config.embeddingModel, logger);
		case 'ollama':
			return new OllamaEmbeddingProvider({
				host: config.ollamaHost,
				model: config.embeddingModel,
				logger,
			});
		case 'openai':
			return new OpenAIEmbeddingProvider({
				apiKey: process.env['OPENAI_API_KEY'],
				baseUrl: config.openaiBaseUrl,
				model: config.embeddingModel,
				logger,
			});
	}
}

export function createTokenEncoder(
	config: CodeloupeConfig,
	logger?: Logger,
): TokenEncoder {
	return new ColbertTokenEncoder(config.multiVector.model, logger);
}
