/**
 * Vendor-neutral conversation with two parallel histories.
 *
 * `messages` holds the generic history; `vendorMessages` holds the same turns
 * in the vendor's native request shape so they never need re-converting. Every
 * request resends the whole vendor history: no server-side session is assumed.
 *
 * The send protocol lives here, once. Vendors only supply the conversion and
 * transport hooks of {@link VendorAdapter}.
 */

import { randomInt } from 'crypto';
import { ConversationStateError, ContentValidationError, VendorRequestError } from './errors.js';
import { addUsage, EMPTY_USAGE } from './message.js';
import type { Message, TokenUsage } from './types.js';
import { formatModelId, VENDORS, type ModelId, type Vendor } from './vendors.js';

export interface VendorAdapter<V, R> {
  readonly vendor: Vendor;

  /** Fails with a content or unsupported-variant error, never drops content. */
  toVendorMessage(message: Message): Promise<V>;

  /** One round trip carrying the entire history. */
  sendConversationToVendor(history: readonly V[], modelId: ModelId): Promise<R>;

  vendorResponseToVendorMessage(response: R): V;

  fromVendorResponse(response: R): Message;

  isCacheable(): boolean;

  /** Marks the working copy of the history in place before a send. */
  configureCaching(history: V[]): void;
}

export interface ConversationOptions {
  name?: string;
}

const NAME_PREFIX = 'Untitled-';
const NAME_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
const NAME_SUFFIX_LENGTH = 16;

export function generateDefaultName(now: number = Date.now()): string {
  let suffix = '';
  for (let i = 0; i < NAME_SUFFIX_LENGTH; i++) {
    suffix += NAME_ALPHABET[randomInt(NAME_ALPHABET.length)];
  }
  return `${NAME_PREFIX}${now}-${suffix}`;
}

// Vendor turns are shared with callers through vendorMessages; adapters
// replace entries rather than editing them.
function deepFreeze(value: unknown): void {
  if (value === null || typeof value !== 'object' || Object.isFrozen(value)) return;
  Object.freeze(value);
  Object.values(value).forEach(deepFreeze);
}

export class Conversation<V, R> {
  readonly modelId: ModelId;
  vendorConversationId?: string;
  vendorProjectId?: string;

  private readonly adapter: VendorAdapter<V, R>;
  private persistedId?: string;
  private currentName: string;
  private starred = false;

  // Replaced, never mutated, so previously returned views stay stable
  private history: readonly Message[] = Object.freeze([]);
  private vendorHistory: readonly V[] = Object.freeze([]);
  private totals: TokenUsage = EMPTY_USAGE;

  private sending = false;
  private unanswered = false;

  constructor(modelId: ModelId, adapter: VendorAdapter<V, R>, options: ConversationOptions = {}) {
    if (!modelId?.vendor || !modelId.apiModelName) {
      throw new ContentValidationError('modelId cannot be empty');
    }
    if (adapter.vendor !== modelId.vendor) {
      throw new ContentValidationError(
        `Adapter for ${adapter.vendor} cannot serve model ${formatModelId(modelId)}`,
      );
    }
    this.modelId = modelId;
    this.adapter = adapter;
    this.currentName =
      options.name && options.name.trim() ? options.name : generateDefaultName();
  }

  // ---------- Identity ----------

  get id(): string | undefined {
    return this.persistedId;
  }

  /** Called by the persistence layer once it has generated an id. */
  assignId(id: string): void {
    if (!id?.trim()) {
      throw new ContentValidationError('Conversation id cannot be blank');
    }
    if (this.persistedId !== undefined) {
      throw new ConversationStateError(`Conversation already has id ${this.persistedId}`);
    }
    this.persistedId = id;
  }

  get name(): string {
    return this.currentName;
  }

  rename(newName: string): void {
    if (!newName?.trim()) {
      throw new ContentValidationError('Conversation name cannot be blank');
    }
    this.currentName = newName;
  }

  get isStarred(): boolean {
    return this.starred;
  }

  star(): void {
    this.starred = true;
  }

  unstar(): void {
    this.starred = false;
  }

  setStarred(starred: boolean): void {
    this.starred = starred;
  }

  toggleStar(): void {
    this.starred = !this.starred;
  }

  // ---------- Histories ----------

  get messages(): readonly Message[] {
    return this.history;
  }

  get vendorMessages(): readonly V[] {
    return this.vendorHistory;
  }

  get totalInputTokens(): number {
    return this.totals.inputTokens;
  }

  get totalOutputTokens(): number {
    return this.totals.outputTokens;
  }

  get totalUsage(): TokenUsage {
    return this.totals;
  }

  /** True after a failed send left a user turn without a reply. */
  get hasUnansweredTurn(): boolean {
    return this.unanswered;
  }

  /** Appends a turn to both histories without contacting the vendor. */
  async append(message: Message): Promise<void> {
    this.assertReady();
    this.sending = true;
    try {
      const vendorMessage = await this.adapter.toVendorMessage(message);
      this.commit([message], [vendorMessage]);
    } finally {
      this.sending = false;
    }
  }

  clearMessages(): void {
    this.history = Object.freeze([]);
    this.vendorHistory = Object.freeze([]);
    this.totals = EMPTY_USAGE;
    this.unanswered = false;
  }

  // ---------- Send protocol ----------

  async sendMessage(message: Message, useCaching = true): Promise<Message> {
    this.assertReady();
    this.sending = true;
    try {
      // Conversion failures leave both histories untouched
      const vendorMessage = await this.adapter.toVendorMessage(message);
      this.commit([message], [vendorMessage]);

      if (useCaching) {
        this.configureCaching();
      }

      let response: R;
      try {
        response = await this.adapter.sendConversationToVendor(this.vendorHistory, this.modelId);
      } catch (err) {
        this.unanswered = true;
        throw new VendorRequestError(
          `Failed to send conversation to ${VENDORS[this.modelId.vendor].displayName}`,
          this.modelId.vendor,
          { cause: err },
        );
      }

      let vendorReply: V;
      let reply: Message;
      try {
        vendorReply = this.adapter.vendorResponseToVendorMessage(response);
        reply = this.adapter.fromVendorResponse(response);
      } catch (err) {
        this.unanswered = true;
        throw err;
      }

      this.commit([reply], [vendorReply]);
      this.totals = addUsage(this.totals, reply.usage);
      return reply;
    } finally {
      this.sending = false;
    }
  }

  private configureCaching(): void {
    if (!this.adapter.isCacheable()) {
      console.log(`Caching requested but not supported by vendor: ${VENDORS[this.modelId.vendor].displayName}`);
      return;
    }
    const working = [...this.vendorHistory];
    this.adapter.configureCaching(working);
    working.forEach(deepFreeze);
    this.vendorHistory = Object.freeze(working);
  }

  private commit(messages: readonly Message[], vendorMessages: readonly V[]): void {
    this.history = Object.freeze([...this.history, ...messages]);
    vendorMessages.forEach(deepFreeze);
    this.vendorHistory = Object.freeze([...this.vendorHistory, ...vendorMessages]);
  }

  private assertReady(): void {
    if (this.sending) {
      throw new ConversationStateError('A message is already being sent in this conversation');
    }
    if (this.unanswered) {
      throw new ConversationStateError(
        'The last user turn has no reply; call clearMessages() before sending again',
      );
    }
  }
}
