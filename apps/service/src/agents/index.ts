import type { AgentName } from '@listsmith/core';

import type { ListingAgent, ListingAgentDependencies } from './base-agent.js';
import { ContentAgent } from './content-agent.js';
import { CustomerResearchAgent } from './customer-research-agent.js';
import { DescriptionAgent } from './description-agent.js';
import { ImageSearchAgent } from './image-search-agent.js';
import { ListingReviewAgent } from './listing-review-agent.js';
import { PricingStrategyAgent } from './pricing-strategy-agent.js';
import { ProductAnalysisAgent } from './product-analysis-agent.js';
import { SeoAgent } from './seo-agent.js';
import { SocialContentAgent } from './social-content-agent.js';
import { TechnicalSpecsAgent } from './technical-specs-agent.js';
import { ValuePropositionAgent } from './value-proposition-agent.js';

export type AgentRegistry = { readonly [K in AgentName]: ListingAgent<K> };

export const createListingAgents = (dependencies: ListingAgentDependencies): AgentRegistry => ({
  'product-analysis': new ProductAnalysisAgent(dependencies),
  'customer-research': new CustomerResearchAgent(dependencies),
  'value-proposition': new ValuePropositionAgent(dependencies),
  'technical-specs': new TechnicalSpecsAgent(dependencies),
  content: new ContentAgent(dependencies),
  description: new DescriptionAgent(dependencies),
  'pricing-strategy': new PricingStrategyAgent(dependencies),
  seo: new SeoAgent(dependencies),
  'social-content': new SocialContentAgent(dependencies),
  'image-search': new ImageSearchAgent(dependencies),
  'listing-review': new ListingReviewAgent(dependencies)
});

export { ListingAgent, RESPONSE_CONFIDENCE_INSTRUCTION } from './base-agent.js';
export type { FallbackResultOptions, ListingAgentDependencies } from './base-agent.js';
export { createFallbackTables, loadFallbackTables, type FallbackTables } from './fallback-tables.js';
