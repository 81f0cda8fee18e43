/**
 * Listing-escrow DTO package public surface.
 * Re-exports ledger shapes, listing terms and rejection codes shared by every other package.
 */
export * from './enums';
export * from './reasons';
export * from './ledger';
export * from './listing';
