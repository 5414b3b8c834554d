import { describe, it, expect } from 'vitest';
import { parseOverrideRequest } from '@/overrides/request';

const rawDocumentation = {
  what_model_misses: 'Pricing power after the competitor exit',
  why_view_more_accurate: 'Trailing margins predate the exit',
  what_proves_wrong: 'Gross margin flat over the next two quarters',
  conviction: 'HIGH',
  evidence_pieces: ['Competitor filing', 'Price list comparison'],
};

describe('parseOverrideRequest', () => {
  it('builds a typed request from a valid payload', () => {
    const parsed = parseOverrideRequest({
      entity_id: ' acme ',
      override_type: 'SENTIMENT',
      sentiment_override: { adjustment: 5 },
      documentation: rawDocumentation,
      current_price: 101.5,
      requested_at: '2026-03-02T11:00:00+01:00',
    });

    expect(parsed.violations).toEqual([]);
    expect(parsed.request).toEqual({
      type: 'SENTIMENT',
      entityId: 'ACME',
      requestedAt: '2026-03-02T10:00:00.000Z',
      currentPrice: 101.5,
      sentiment: { adjustment: 5 },
      documentation: {
        whatModelMisses: 'Pricing power after the competitor exit',
        whyMoreAccurate: 'Trailing margins predate the exit',
        whatProvesWrong: 'Gross margin flat over the next two quarters',
        conviction: 'HIGH',
        evidence: ['Competitor filing', 'Price list comparison'],
      },
    });
  });

  it('stamps the request time when none is given', () => {
    const parsed = parseOverrideRequest(
      { entity_id: 'ACME', override_type: 'NONE' },
      new Date('2026-03-05T09:30:00Z')
    );
    expect(parsed.request).toEqual({
      type: 'NONE',
      entityId: 'ACME',
      requestedAt: '2026-03-05T09:30:00.000Z',
      currentPrice: null,
    });
  });

  it('keeps additional notes', () => {
    const parsed = parseOverrideRequest({
      entity_id: 'ACME',
      override_type: 'WEIGHT',
      weight_override: { fundamental: 0.5, technical: 0.3, sentiment: 0.2 },
      documentation: { ...rawDocumentation, additional_notes: 'Revisit after earnings' },
    });
    expect(parsed.request?.type === 'WEIGHT' && parsed.request.documentation.notes).toBe(
      'Revisit after earnings'
    );
  });

  it('requires the payload the type names', () => {
    const parsed = parseOverrideRequest({
      entity_id: 'ACME',
      override_type: 'WEIGHT',
      documentation: rawDocumentation,
    });
    expect(parsed.request).toBeNull();
    expect(parsed.violations).toEqual(['Weight override data required for WEIGHT override']);
  });

  it('rejects payloads the type does not use', () => {
    const parsed = parseOverrideRequest({
      entity_id: 'ACME',
      override_type: 'NONE',
      sentiment_override: { adjustment: 2 },
    });
    expect(parsed.violations).toEqual(['Sentiment override data not allowed for NONE override']);
  });

  it('requires documentation for every override type but NONE', () => {
    const parsed = parseOverrideRequest({
      entity_id: 'ACME',
      override_type: 'SENTIMENT',
      sentiment_override: { adjustment: 2 },
      documentation: null,
    });
    expect(parsed.violations).toEqual(['Documentation is required for all overrides']);
  });

  it('collects every payload mismatch', () => {
    const parsed = parseOverrideRequest({ entity_id: 'ACME', override_type: 'BOTH' });
    expect(parsed.violations).toEqual([
      'Weight override data required for BOTH override',
      'Sentiment override data required for BOTH override',
      'Documentation is required for all overrides',
    ]);
  });

  it('reports schema errors', () => {
    const parsed = parseOverrideRequest({ entity_id: 'ACME', override_type: 'MAYBE' });
    expect(parsed.request).toBeNull();
    expect(parsed.violations).toEqual([
      '/override_type: must be equal to one of the allowed values',
    ]);
  });

  it('rejects an entity id made only of spaces', () => {
    const parsed = parseOverrideRequest({ entity_id: '   ', override_type: 'NONE' });
    expect(parsed.request).toBeNull();
    expect(parsed.violations).toEqual(['/entity_id: must match pattern "\\S"']);
  });

  it('rejects a payload that is not an object', () => {
    const parsed = parseOverrideRequest('ACME');
    expect(parsed.request).toBeNull();
    expect(parsed.violations).toEqual(['root: must be object']);
  });
});
