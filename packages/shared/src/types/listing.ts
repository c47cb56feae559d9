/** Base-10 integer string in base units of the fungible balance. */
export type Amount = string;

/** Checksummed 20-byte hex address. */
export type Address = string;

export interface Listing {
  listingId: number;
  itemId: string;
  price: Amount;
  recordedOwner: Address;       // registry answer at listing time, not a live fact
  itemRegistryAddress: Address;
  metadataURI: string;
  createdAt: string;            // ISO date
}

export interface AdminConfig {
  admin: Address;
  feePercentBasisPoints: number;
  minimumFee: Amount;
  updatedAt: string;
}

export interface FeeSchedule {
  feePercentBasisPoints: number;
  minimumFee: Amount;
}
