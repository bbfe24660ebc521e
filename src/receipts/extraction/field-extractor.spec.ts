import { analysisFromFixture } from '../../../test/support/fixtures';
import { OcrAnalysis, OcrWireField } from '../../ocr/ocr.types';
import { ReceiptItem, ReceiptStatus } from '../interfaces/receipt.interface';
import { FieldExtractor, ReceiptSeed } from './field-extractor';

const seed: ReceiptSeed = {
  id: 'receipt-1',
  userId: 'user-1',
  contentHash: 'hash-1',
  imageKey: 'users/user-1/receipts/2024/03/06/receipt-1/receipt.jpg',
  originalFileName: 'receipt.jpg',
  contentType: 'image/jpeg',
  status: ReceiptStatus.Validated,
  createdAt: new Date('2024-03-06T10:00:00.000Z'),
  isValidReceipt: true,
  validationConfidence: 0.93,
  validationMessage: 'Valid receipt',
};

const sequentialIds = () => {
  let next = 0;
  return () => `item-${++next}`;
};

const extractor = (threshold = 0.5) =>
  new FieldExtractor({ locationReviewThreshold: threshold, newItemId: sequentialIds() });

const withFields = (analysis: OcrAnalysis, fields: Record<string, OcrWireField>): OcrAnalysis => ({
  ...analysis,
  fields: { ...analysis.fields, ...fields },
});

const EXPECTED_ITEMS: ReceiptItem[] = [
  { id: 'item-1', name: 'Flat White', quantity: 2, price: 7, unitPrice: 3.5, totalPrice: 7, confidence: 0.91 },
  { id: 'item-2', name: 'Croissant', quantity: 1, price: 4, unitPrice: 4, totalPrice: undefined, confidence: 0.89 },
  { id: 'item-3', name: 'Water', quantity: 1, price: 2, unitPrice: undefined, totalPrice: 2, confidence: 0.8 },
];

describe('FieldExtractor', () => {
  let analysis: OcrAnalysis;
  let scalarItemsAnalysis: OcrAnalysis;

  beforeAll(async () => {
    analysis = await analysisFromFixture('ocr-response');
    scalarItemsAnalysis = await analysisFromFixture('ocr-response-scalar-items');
  });

  it('builds the receipt aggregate from the field tree', () => {
    const receipt = extractor().extract(seed, analysis);

    expect(receipt).toEqual({
      id: 'receipt-1',
      userId: 'user-1',
      contentHash: 'hash-1',
      storeName: 'Corner Cafe',
      storeAddress: '12 Market Street, Springfield',
      storePhoneNumber: '+1 555 0100',
      postalCode: '12345',
      country: 'US',
      purchaseDate: new Date('2024-03-05T00:00:00.000Z'),
      totalAmount: 14.3,
      subtotalAmount: 13,
      taxAmount: 1.3,
      tipAmount: undefined,
      receiptType: 'Meal',
      transactionId: 'TX-1001',
      items: EXPECTED_ITEMS,
      imageKey: seed.imageKey,
      originalFileName: 'receipt.jpg',
      contentType: 'image/jpeg',
      ocrProvider: 'document-intelligence',
      ocrConfidence: 0.92,
      locationConfidence: 0.85,
      extractionStrategy: 'header_block',
      status: ReceiptStatus.Validated,
      isValidReceipt: true,
      validationConfidence: 0.93,
      validationMessage: 'Valid receipt',
      requiresManualReview: false,
      createdAt: seed.createdAt,
    });
  });

  it('reads three items delivered only inside a generic scalar node', () => {
    const receipt = extractor().extract(seed, scalarItemsAnalysis);
    expect(receipt.items).toEqual(EXPECTED_ITEMS);
  });

  it('yields the same items whatever the list representation', () => {
    const stringItems = withFields(scalarItemsAnalysis, {
      Items: { value: JSON.stringify(scalarItemsAnalysis.fields.Items.value), value_type: 'string', confidence: 0.9 },
    });

    const fromArray = extractor().extract(seed, analysis).items;
    const fromScalar = extractor().extract(seed, scalarItemsAnalysis).items;
    const fromString = extractor().extract(seed, stringItems).items;

    expect(fromScalar).toEqual(fromArray);
    expect(fromString).toEqual(fromArray);
  });

  it('reads items whose fields arrive as a plain map', () => {
    const receipt = extractor().extract(
      seed,
      withFields(analysis, {
        Items: {
          value_type: 'list',
          value: [
            { Description: { value: 'Bagel' }, Quantity: { value: '3' }, Price: { value: '1.50' } },
            { Name: 'Juice', TotalPrice: 2.25 },
          ],
        },
      }),
    );

    expect(receipt.items).toEqual([
      { id: 'item-1', name: 'Bagel', quantity: 3, price: 1.5, unitPrice: 1.5, totalPrice: undefined, confidence: undefined },
      { id: 'item-2', name: 'Juice', quantity: 1, price: 2.25, unitPrice: undefined, totalPrice: 2.25, confidence: undefined },
    ]);
  });

  it('skips a malformed item without losing its siblings', () => {
    const receipt = extractor().extract(
      seed,
      withFields(analysis, {
        Items: {
          value_array: [
            { value_object: { Description: { value: 'Tea' }, Price: { value: 2 } } },
            { value: 17, value_type: 'number' },
            { value_object: { Description: { value: 'Cake' }, Price: { value: 'n/a' } } },
          ],
        },
      }),
    );

    expect(receipt.items.map(item => [item.name, item.price])).toEqual([
      ['Tea', 2],
      ['Cake', 0],
    ]);
    expect(receipt.totalAmount).toBe(14.3);
  });

  it('keeps extracting when building one item throws', () => {
    let calls = 0;
    const flaky = new FieldExtractor({
      locationReviewThreshold: 0.5,
      newItemId: () => {
        calls += 1;
        if (calls === 2) {
          throw new Error('id generator hiccup');
        }
        return `item-${calls}`;
      },
    });

    const receipt = flaky.extract(seed, analysis);

    expect(receipt.items.map(item => item.name)).toEqual(['Flat White', 'Water']);
  });

  it('returns no items when the field is missing', () => {
    const { Items: _items, ...rest } = analysis.fields;
    const receipt = extractor().extract(seed, { ...analysis, fields: rest });
    expect(receipt.items).toEqual([]);
  });

  it('lets location metadata override store identity but not totals', () => {
    const receipt = extractor().extract(seed, {
      ...analysis,
      metadata: {
        ...analysis.metadata,
        merchant_name: 'Corner Cafe Downtown',
        merchant_address: '1 Side Street',
        merchant_phone: '+1 555 0199',
      },
    });

    expect(receipt.storeName).toBe('Corner Cafe Downtown');
    expect(receipt.storeAddress).toBe('1 Side Street');
    expect(receipt.storePhoneNumber).toBe('+1 555 0199');
    expect(receipt.totalAmount).toBe(14.3);
    expect(receipt.items).toHaveLength(3);
  });

  it('falls back to the tesseract confidence and flags low scores for review', () => {
    const { location_confidence: _confidence, ...metadata } = analysis.metadata;
    const receipt = extractor().extract(seed, {
      ...analysis,
      metadata: { ...metadata, tesseract_confidence: '0.3' },
    });

    expect(receipt.locationConfidence).toBe(0.3);
    expect(receipt.requiresManualReview).toBe(true);
    expect(receipt.status).toBe(ReceiptStatus.Validated);
  });

  it('uses the configured review threshold', () => {
    expect(extractor(0.9).extract(seed, analysis).requiresManualReview).toBe(true);
  });

  it('flags a store name the extractor marked for review', () => {
    const receipt = extractor().extract(
      seed,
      withFields(analysis, {
        MerchantName: { value: 'C0rner Caf3', value_type: 'string', source: 'fallback', requires_manual_review: true },
      }),
    );
    expect(receipt.storeName).toBe('C0rner Caf3');
    expect(receipt.requiresManualReview).toBe(true);
  });

  it.each(['', 'Unknown Store'])('flags the store name %p for review', name => {
    const receipt = extractor().extract(seed, withFields(analysis, { MerchantName: { value: name } }));
    expect(receipt.requiresManualReview).toBe(true);
  });

  it('keeps a review flag set by the caller', () => {
    const receipt = extractor().extract({ ...seed, requiresManualReview: true }, analysis);
    expect(receipt.requiresManualReview).toBe(true);
  });

  it('treats unparsable scalars as absent', () => {
    const receipt = extractor().extract(
      seed,
      withFields(analysis, {
        Total: { value: 'N/A' },
        TransactionDate: { value: 'unreadable' },
      }),
    );
    expect(receipt.totalAmount).toBeUndefined();
    expect(receipt.purchaseDate).toBeUndefined();
  });
});
