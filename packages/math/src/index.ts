/**
 * Listing-escrow math public surface. Pure, side-effect free helpers.
 */
export * from './fee'
