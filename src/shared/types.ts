/**
 * Shared Type Definitions
 * Layer: Shared
 *
 * Request/response shapes that cross layers. CreateSwiftCodeInput is the
 * validated POST body the controller hands to SwiftCodeService;
 * IngestionResult is what the loader reports to the server bootstrap and the
 * seed script.
 */
export interface CreateSwiftCodeInput {
  swiftCode: string;
  bankName: string;
  address: string;
  countryISO2: string;
  countryName: string;
  isHeadquarters: boolean;
}

/** Body of every error response. */
export interface ErrorResponseBody {
  status: 'error';
  message: string;
}

/** Timing metadata attached to every successful API response. */
export interface ResponseMeta {
  /** Wall-clock time from request arrival to response sent (ms). */
  totalTimeMs?: number;
}

export interface IngestionResult {
  totalRead: number;
  totalInserted: number;
  totalSkipped: number;
  durationMs: number;
}
