import { buildPublicSentimentPrompt } from "@/backend/application/prompts";
import { extractSentiment, type PublicSentiment } from "@/backend/domain/analysis";
import type { Logger } from "@/backend/ports/logger";
import {
  ModelConfigurationError,
  ModelRequestError,
  type ModelClient,
} from "@/backend/ports/model-client";
import {
  SocialSearchRequestError,
  type SocialSearchClient,
} from "@/backend/ports/social-search-client";

const TOPIC_LENGTH = 50;
const POST_LIMIT = 10;

/**
 * Best-effort read of how social media is reacting to a topic. Returns null when
 * no posts are available or a capability fails; it never fails the caller.
 */
export class GaugePublicSentimentUseCase {
  constructor(
    private readonly socialSearch: SocialSearchClient,
    private readonly modelClient: ModelClient,
    private readonly logger: Logger,
  ) {}

  async execute(content: string): Promise<PublicSentiment | null> {
    const topic = content.trim().slice(0, TOPIC_LENGTH);
    if (!topic || !this.socialSearch.isConfigured() || !this.modelClient.isConfigured()) {
      return null;
    }

    try {
      const posts = (await this.socialSearch.searchRecent(topic, POST_LIMIT)).slice(0, POST_LIMIT);
      if (posts.length === 0) {
        return null;
      }

      const generation = await this.modelClient.generateText({
        messages: [{ role: "user", content: buildPublicSentimentPrompt(posts) }],
      });

      return {
        sentiment: extractSentiment(generation.text),
        postCount: posts.length,
        samplePosts: posts.map((post) => post.text),
      };
    } catch (error) {
      if (
        error instanceof SocialSearchRequestError ||
        error instanceof ModelRequestError ||
        error instanceof ModelConfigurationError
      ) {
        this.logger.warn("Public sentiment lookup failed", { reason: error.message });
        return null;
      }

      throw error;
    }
  }
}
