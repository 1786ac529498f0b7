/**
 * @fileoverview Registers core application services with the DI container:
 * configuration, logging, and the RadFlow service stack.
 * @module src/container/registrations/core
 */
import { config as parsedConfig } from '../../config/index.js';
import { PartnerTokenService } from '../../services/radflow/auth/partnerTokenService.js';
import { TokenCache } from '../../services/radflow/auth/tokenCache.js';
import { RadFlowProvider as RadFlowProviderClass } from '../../services/radflow/providers/radflow.provider.js';
import { logger } from '../../utils/index.js';
import { container } from '../core/container.js';
import {
  AppConfig,
  Logger,
  PartnerTokenServiceToken,
  RadFlowProvider,
  TokenCacheToken,
} from '../core/tokens.js';

/**
 * Registers core application services and values with the container.
 */
export const registerCoreServices = () => {
  container.registerValue(AppConfig, parsedConfig);
  container.registerValue(Logger, logger);

  // One cache per process; every token consumer shares it.
  container.registerSingleton(TokenCacheToken, () => new TokenCache());

  container.registerSingleton(PartnerTokenServiceToken, (c) => {
    const { radflow } = c.resolve(AppConfig);
    return new PartnerTokenService(c.resolve(TokenCacheToken), {
      tokenUrl: radflow.partnerTokenUrl,
      partnerApiKey: radflow.partnerApiKey,
      timeoutMs: radflow.requestTimeoutMs,
    });
  });

  container.registerSingleton(
    RadFlowProvider,
    (c) =>
      new RadFlowProviderClass(
        c.resolve(AppConfig).radflow,
        c.resolve(PartnerTokenServiceToken),
      ),
  );

  logger.info('Core services registered with the DI container.');
};
