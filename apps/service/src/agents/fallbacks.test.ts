import { AGENT_NAMES, AgentPayloadSchemas } from '@listsmith/core';
import { alwaysReply, createScriptedTextGenerationClient, loadProductFixture } from '@listsmith/fixtures';
import { describe, expect, it } from 'vitest';

import { createSilentLogger } from '../logger.js';
import { loadFallbackTables } from './fallback-tables.js';
import { createListingAgents } from './index.js';

const smartwatch = loadProductFixture('smartwatch-pro-x1');
const hydrationPack = loadProductFixture('trailhead-hydration-pack');

const agents = createListingAgents({
  client: createScriptedTextGenerationClient(alwaysReply({ kind: 'timeout' })),
  tables: loadFallbackTables(),
  logger: createSilentLogger()
});

describe('fallback generators', () => {
  it('writes a title from the name and leading features', () => {
    expect(agents['product-analysis'].fallback(smartwatch).title).toBe('Smartwatch Pro X1 - GPS, 7-day battery');
  });

  it('pads bullet points to three', () => {
    expect(agents['value-proposition'].fallback(smartwatch)).toEqual({
      headline: 'Smartwatch Pro X1: GPS',
      bulletPoints: ['GPS', '7-day battery', 'Thoughtfully designed Smartwatch Pro X1 for everyday use']
    });
  });

  it('positions the price within the category band', () => {
    expect(agents['pricing-strategy'].fallback(smartwatch)).toEqual({
      recommendedPrice: 199.99,
      positioning: 'mid-range',
      competitorRange: { low: 159.99, high: 239.99 },
      promotions: ['10% launch coupon for the first two weeks'],
      notes: ['Positioned as mid-range for Electronics at the target price']
    });
  });

  it('combines product terms with category keywords', () => {
    expect(agents.seo.fallback(smartwatch)).toEqual({
      searchTerms: ['smartwatch pro x1', 'gps', '7-day battery', 'wireless', 'rechargeable', 'smart'],
      backendKeywords: [
        'smartwatch',
        'pro',
        'x1',
        'electronics',
        'portable',
        'bluetooth',
        'gadget',
        'tech accessory',
        'best seller',
        'gift idea',
        'high quality',
        'top rated'
      ]
    });
  });

  it('builds hashtags and posts', () => {
    const social = agents['social-content'].fallback(smartwatch);

    expect(social.hashtags).toEqual(['#SmartwatchProX1', '#Electronics', '#ShopSmart', '#GPS', '#7DayBattery']);
    expect(social.posts[0]).toEqual({
      platform: 'instagram',
      text: 'Meet Smartwatch Pro X1. GPS, 7-day battery #SmartwatchProX1 #Electronics #ShopSmart'
    });
  });

  it('uses catalog images when the seller provided none', () => {
    expect(agents['image-search'].fallback(smartwatch).urls).toEqual([
      'https://images.example.com/catalog/electronics/hero-1.jpg',
      'https://images.example.com/catalog/electronics/hero-2.jpg',
      'https://images.example.com/catalog/electronics/hero-3.jpg'
    ]);
  });

  it('lists box contents and specifications from the input', () => {
    expect(agents.content.fallback(smartwatch)).toEqual({ items: ['Smartwatch Pro X1'], warranty: '', certifications: [] });
    expect(agents.content.fallback(hydrationPack).items).toEqual(['Hydration pack', '2L reservoir', 'cleaning brush']);
    expect(agents['technical-specs'].fallback(smartwatch)).toEqual({
      specifications: [
        { name: 'Feature', value: 'GPS' },
        { name: 'Feature', value: '7-day battery' }
      ],
      compatibility: []
    });
  });

  it('writes a description from the available facts', () => {
    expect(agents.description.fallback(smartwatch).description).toBe(
      'Smartwatch Pro X1 is made for everyday electronics use.\n\nKey features: GPS, 7-day battery.'
    );
  });

  it('reviews an empty draft with one recommendation per gap', () => {
    expect(agents['listing-review'].fallback(smartwatch)).toEqual({
      score: 5,
      strengths: [],
      recommendations: [
        'Expand the title with key features (currently 0 characters)',
        'Add more bullet points (0 of 5)',
        'Lengthen the description to at least 300 characters',
        'Add more search terms (0 of 5)',
        'Add product images'
      ]
    });
  });

  it('produces schema-valid payloads for sparse and complete inputs', () => {
    for (const input of [smartwatch, hydrationPack]) {
      for (const name of AGENT_NAMES) {
        expect(AgentPayloadSchemas[name].safeParse(agents[name].fallback(input)).success).toBe(true);
      }
    }
  });
});
