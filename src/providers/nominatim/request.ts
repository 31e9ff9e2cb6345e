/**
 * Nominatim Search Request
 *
 * Parameters of a single Nominatim search and their validation.
 *
 * @module providers/nominatim/request
 */

export const MIN_LIMIT = 1;
export const MAX_LIMIT = 100;

/**
 * Default request parameters
 */
export const REQUEST_DEFAULTS = {
  limit: 50,
  addressDetails: true,
  featureType: 'city',
  format: 'json',
} as const;

/**
 * Mutable request builder. Setters ignore values outside the accepted range
 * and keep the previous value.
 *
 * @example
 * ```typescript
 * const request = new NominatimSearchRequest('Berlin');
 * request.setLimit(10);
 * const url = request.toUrl('https://nominatim.openstreetmap.org/search');
 * ```
 */
export class NominatimSearchRequest {
  private _query: string;
  private _limit: number = REQUEST_DEFAULTS.limit;
  private _addressDetails: boolean = REQUEST_DEFAULTS.addressDetails;
  private _featureType: string = REQUEST_DEFAULTS.featureType;
  private _format: string = REQUEST_DEFAULTS.format;

  constructor(query = '') {
    this._query = query;
  }

  get query(): string {
    return this._query;
  }

  get limit(): number {
    return this._limit;
  }

  get addressDetails(): boolean {
    return this._addressDetails;
  }

  get featureType(): string {
    return this._featureType;
  }

  get format(): string {
    return this._format;
  }

  setLimit(limit: number): void {
    if (Number.isInteger(limit) && limit >= MIN_LIMIT && limit <= MAX_LIMIT) {
      this._limit = limit;
    }
  }

  setAddressDetails(enabled: boolean): void {
    this._addressDetails = enabled;
  }

  setFeatureType(featureType: string): void {
    if (featureType !== '') {
      this._featureType = featureType;
    }
  }

  setFormat(format: string): void {
    if (format !== '') {
      this._format = format;
    }
  }

  /**
   * First validation failure, or null when the request can be sent.
   */
  validationError(): string | null {
    if (this._query.trim() === '') {
      return 'Query cannot be empty';
    }
    if (this._limit < MIN_LIMIT || this._limit > MAX_LIMIT) {
      return `Limit must be between ${MIN_LIMIT} and ${MAX_LIMIT}`;
    }
    if (this._format === '') {
      return 'Format cannot be empty';
    }
    if (this._featureType === '') {
      return 'Feature type cannot be empty';
    }
    return null;
  }

  isValid(): boolean {
    return this.validationError() === null;
  }

  /**
   * Query-string parameters in the order Nominatim documents them.
   */
  toSearchParams(): URLSearchParams {
    return new URLSearchParams({
      q: this._query,
      format: this._format,
      addressdetails: this._addressDetails ? '1' : '0',
      limit: String(this._limit),
      featuretype: this._featureType,
    });
  }

  toUrl(baseUrl: string): string {
    return `${baseUrl}?${this.toSearchParams().toString()}`;
  }
}
