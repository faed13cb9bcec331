import { Inject, Injectable } from '@nestjs/common';
import { ChatBedrockConverse } from '@langchain/aws';
import { APP_CONFIG, type AppConfig } from '../config/app.config';

export type ModelSettings = {
  temperature: number;
  maxTokens: number;
};

@Injectable()
export class LangchainService {
  private readonly models = new Map<string, ChatBedrockConverse>();

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  // one client per (temperature, maxTokens) pair
  model(settings: ModelSettings): ChatBedrockConverse {
    const key = `${settings.temperature}:${settings.maxTokens}`;
    let llm = this.models.get(key);
    if (!llm) {
      llm = new ChatBedrockConverse({
        model: this.config.generation.model,
        region: this.config.aws.region,
        temperature: settings.temperature,
        maxTokens: settings.maxTokens,
        // no SDK-level retries
        maxRetries: 0,
      });
      this.models.set(key, llm);
    }
    return llm;
  }
}
