import { hasRedditCredentials, type Config, type StrategyName } from '../shared/config.js';
import { logger } from '../shared/logger.js';
import type { TransportStrategy } from './adapter.js';
import { FeedStrategy } from './feed.js';
import { HybridStrategy } from './hybrid.js';
import { JsonStrategy } from './json.js';
import { OAuthStrategy, TokenCache } from './oauth.js';

export type { TransportStrategy, RawResponse, AcceptedPayload, ForumPost, PayloadFormat } from './adapter.js';
export { FeedStrategy, HybridStrategy, JsonStrategy, OAuthStrategy, TokenCache };

/**
 * Build the fallback chain in configured order. Priority follows position
 * in `order`; oauth is left out when credentials are missing.
 */
export function buildStrategies(
  config: Config,
  tokens: TokenCache,
  order: readonly StrategyName[] = config.strategies,
): TransportStrategy[] {
  const strategies: TransportStrategy[] = [];

  order.forEach((name, index) => {
    const priority = index + 1;
    switch (name) {
      case 'oauth':
        if (!hasRedditCredentials(config)) {
          logger.warn('REDDIT_CLIENT_ID / REDDIT_CLIENT_SECRET not set, skipping oauth strategy');
          return;
        }
        strategies.push(
          new OAuthStrategy(
            priority,
            {
              clientId: config.reddit.client_id,
              clientSecret: config.reddit.client_secret,
              userAgent: config.reddit.user_agent,
            },
            tokens,
            config.listing_limit,
          ),
        );
        return;
      case 'feed':
        strategies.push(new FeedStrategy(priority, config.user_agent, config.mirrors));
        return;
      case 'hybrid':
        strategies.push(
          new HybridStrategy(priority, config.user_agent, config.mirrors, {
            limit: config.listing_limit,
            postDelayMs: config.hybrid.post_delay_ms,
            attemptTimeoutMs: config.hybrid.attempt_timeout_ms,
          }),
        );
        return;
      case 'json':
        strategies.push(
          new JsonStrategy(priority, config.user_agent, config.mirrors, config.listing_limit),
        );
        return;
    }
  });

  return strategies;
}
