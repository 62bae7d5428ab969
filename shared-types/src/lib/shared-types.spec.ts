import {
  DOCUMENT_CATEGORIES,
  GUEST_REQUEST_TYPES,
  INTENT_LABELS,
  IntentLabel,
  isDocumentCategory,
} from './shared-types';

describe('shared-types', () => {
  it('exposes the intent taxonomy in tie-break order', () => {
    const expected: IntentLabel[] = [
      'booking',
      'complaint',
      'inquiry',
      'service_request',
      'checkout',
      'amenities',
      'emergency',
      'policy_inquiry',
      'concierge_request',
      'guest_request',
    ];

    expect(INTENT_LABELS).toEqual(expected);
  });

  it('lists every guest request type', () => {
    expect(GUEST_REQUEST_TYPES).toEqual([
      'room_service',
      'concierge',
      'maintenance',
      'housekeeping',
      'complaint',
    ]);
  });

  it('narrows strings to known document categories', () => {
    expect(isDocumentCategory(DOCUMENT_CATEGORIES[1])).toBe(true);
    expect(isDocumentCategory('brochure')).toBe(false);
  });
});
