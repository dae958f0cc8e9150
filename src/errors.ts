import type { Vendor } from './vendors.js';

export class ConversationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Missing API keys, unreadable or malformed model catalogs
export class ConfigurationError extends ConversationError {}

// Bad block/citation input: blank values, disallowed MIME types, unreadable files, non-HTTP(S) URLs
export class ContentValidationError extends ConversationError {}

// A variant, role or vendor that has no concrete mapping where one is required
export class UnsupportedVariantError extends ConversationError {}

export class ConversationStateError extends ConversationError {}

export class VendorRequestError extends ConversationError {
  readonly vendor: Vendor;

  constructor(message: string, vendor: Vendor, options?: ErrorOptions) {
    super(message, options);
    this.vendor = vendor;
  }
}

export function assertNever(value: never, context: string): never {
  throw new UnsupportedVariantError(`Unhandled ${context}: ${JSON.stringify(value)}`);
}
