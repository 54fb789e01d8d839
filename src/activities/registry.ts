import { ActivityNotFoundError, RegistrationStateError } from '../errors.js';
import type {
  Activity,
  ActivityDefinition,
  ActivityListing,
  CatalogDefinition,
  RegistrationResult,
} from './types.js';

export interface RegistryOptions {
  /** Log each successful signup/unregister. Defaults to true. */
  logMutations?: boolean;
}

interface ActivityEntry {
  definition: ActivityDefinition;
  participants: string[];
}

function snapshot(entry: ActivityEntry): Activity {
  return {
    description: entry.definition.description,
    schedule: entry.definition.schedule,
    max_participants: entry.definition.max_participants,
    participants: [...entry.participants],
  };
}

/**
 * Owns the activity catalog and its live rosters for the lifetime of the
 * process. Every operation is synchronous, so a mutation runs to completion
 * on the event loop before any other request is handled.
 *
 * Capacity is reported, never enforced: rosters may grow past max_participants.
 */
export class ActivityRegistry {
  private readonly entries = new Map<string, ActivityEntry>();
  private readonly logMutations: boolean;

  constructor(catalog: CatalogDefinition, options: RegistryOptions = {}) {
    this.logMutations = options.logMutations ?? true;
    for (const [name, definition] of Object.entries(catalog)) {
      this.entries.set(name, {
        definition: { ...definition, participants: [...definition.participants] },
        participants: [...definition.participants],
      });
    }
  }

  get size(): number {
    return this.entries.size;
  }

  list(): ActivityListing {
    const listing: ActivityListing = {};
    for (const [name, entry] of this.entries) {
      Object.defineProperty(listing, name, {
        value: snapshot(entry),
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
    return listing;
  }

  get(activityName: string): Activity {
    return snapshot(this.require(activityName));
  }

  signup(activityName: string, email: string): RegistrationResult {
    const entry = this.require(activityName);
    if (entry.participants.includes(email)) {
      throw new RegistrationStateError('already_signed_up');
    }

    entry.participants.push(email);
    this.log(`Signed up ${email} for ${activityName} (${entry.participants.length}/${entry.definition.max_participants})`);
    return { message: `Signed up ${email} for ${activityName}` };
  }

  unregister(activityName: string, email: string): RegistrationResult {
    const entry = this.require(activityName);
    const idx = entry.participants.indexOf(email);
    if (idx === -1) {
      throw new RegistrationStateError('not_signed_up');
    }

    entry.participants.splice(idx, 1);
    this.log(`Unregistered ${email} from ${activityName} (${entry.participants.length}/${entry.definition.max_participants})`);
    return { message: `Unregistered ${email} from ${activityName}` };
  }

  /** Restore every roster to the catalog the registry was created from. */
  reset(): void {
    for (const entry of this.entries.values()) {
      entry.participants = [...entry.definition.participants];
    }
  }

  private require(activityName: string): ActivityEntry {
    const entry = this.entries.get(activityName);
    if (!entry) throw new ActivityNotFoundError(activityName);
    return entry;
  }

  private log(message: string): void {
    if (!this.logMutations) return;
    console.log(`[${new Date().toISOString()}] [Registry] ${message}`);
  }
}
