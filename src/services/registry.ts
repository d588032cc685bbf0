import { z } from 'zod';
import { logRegistry } from '../utils/logger.js';
import { ConflictError, NotFoundError } from '../utils/errors.js';
import type { ActivityCatalog, ActivityDefinition, RegistryResult } from '../types/activity.js';

export const ACTIVITY_NOT_FOUND = 'Activity not found';
export const ALREADY_SIGNED_UP = 'Student already signed up';
export const ACTIVITY_FULL = 'Activity is full';
export const NOT_REGISTERED = 'Student is not registered for this activity';

const activityDefinitionSchema = z.object({
  description: z.string(),
  schedule: z.string(),
  max_participants: z.number().int().positive(),
  participants: z.array(z.string())
}).superRefine((activity, ctx) => {
  if (new Set(activity.participants).size !== activity.participants.length) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['participants'],
      message: 'Participants must be unique'
    });
  }
  if (activity.participants.length > activity.max_participants) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['participants'],
      message: 'Participants exceed max_participants'
    });
  }
});

const copyActivity = (activity: ActivityDefinition): ActivityDefinition => ({
  ...activity,
  participants: [...activity.participants]
});

/**
 * In-memory registry of activities and their rosters.
 *
 * Every operation is synchronous, so a check-then-act sequence (duplicate and
 * capacity checks followed by the append) cannot interleave with another request.
 * Emails are compared as exact, case-sensitive strings.
 */
export class ActivityRegistry {
  private activities = new Map<string, ActivityDefinition>();

  constructor(seed: ActivityCatalog = {}) {
    this.reset(seed);
  }

  get size(): number {
    return this.activities.size;
  }

  /** Replaces every activity with a copy of `seed`. */
  reset(seed: ActivityCatalog): void {
    this.activities.clear();
    for (const [name, definition] of Object.entries(seed)) {
      this.addActivity(name, definition);
    }
    logRegistry.seeded(this.activities.size);
  }

  /**
   * Adds an activity outside the public API (seeding, tests).
   * Rejects duplicate names, non-positive capacity, and rosters that break the
   * uniqueness or capacity invariants.
   */
  addActivity(name: string, definition: ActivityDefinition): void {
    if (this.activities.has(name)) {
      throw new Error(`Activity "${name}" is already registered`);
    }

    const parsed = activityDefinitionSchema.safeParse(definition);
    if (!parsed.success) {
      const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new Error(`Invalid activity "${name}": ${problems.join(', ')}`);
    }

    this.activities.set(name, copyActivity(parsed.data));
  }

  // fromEntries defines own keys, so names like "__proto__" survive
  list(): ActivityCatalog {
    return Object.fromEntries(
      [...this.activities].map(([name, activity]) => [name, copyActivity(activity)])
    );
  }

  get(name: string): ActivityDefinition | undefined {
    const activity = this.activities.get(name);
    return activity ? copyActivity(activity) : undefined;
  }

  signup(activityName: string, email: string): RegistryResult {
    const activity = this.activities.get(activityName);
    if (!activity) {
      logRegistry.rejected('signup', activityName, email, ACTIVITY_NOT_FOUND);
      throw new NotFoundError(ACTIVITY_NOT_FOUND);
    }

    if (activity.participants.includes(email)) {
      logRegistry.rejected('signup', activityName, email, ALREADY_SIGNED_UP);
      throw new ConflictError(ALREADY_SIGNED_UP);
    }

    if (activity.participants.length >= activity.max_participants) {
      logRegistry.rejected('signup', activityName, email, ACTIVITY_FULL);
      throw new ConflictError(ACTIVITY_FULL);
    }

    activity.participants.push(email);
    logRegistry.signup(activityName, email, activity.participants.length, activity.max_participants);

    return { message: `Signed up ${email} for ${activityName}` };
  }

  unregister(activityName: string, email: string): RegistryResult {
    const activity = this.activities.get(activityName);
    if (!activity) {
      logRegistry.rejected('unregister', activityName, email, ACTIVITY_NOT_FOUND);
      throw new NotFoundError(ACTIVITY_NOT_FOUND);
    }

    const index = activity.participants.indexOf(email);
    if (index === -1) {
      logRegistry.rejected('unregister', activityName, email, NOT_REGISTERED);
      throw new ConflictError(NOT_REGISTERED);
    }

    activity.participants.splice(index, 1);
    logRegistry.unregister(activityName, email, activity.participants.length);

    return { message: `Unregistered ${email} from ${activityName}` };
  }
}
