import { z } from 'zod';

export enum ActivityType {
  GAME = 0,
  STREAMING = 1,
  LISTENING = 2,
  WATCHING = 3,
  CUSTOM = 4,
  COMPETING = 5
}

export const ActivitySchema = z
  .object({
    name: z.string().min(1).max(128),
    type: z.enum(ActivityType).default(ActivityType.GAME),
    url: z.url().nullable().optional(),
    state: z.string().max(128).nullable().optional()
  })
  .refine((activity) => !activity.url || activity.type === ActivityType.STREAMING, {
    message: 'Only streaming activities can carry a url',
    path: ['url']
  });

export type Activity = z.infer<typeof ActivitySchema>;
export type ActivityInput = z.input<typeof ActivitySchema>;

export const StatusSchema = z.enum(['online', 'idle', 'dnd', 'invisible', 'offline']);

export type Status = z.infer<typeof StatusSchema>;

export const PresenceSchema = z.object({
  since: z.number().nullable(),
  afk: z.boolean(),
  activities: z.array(ActivitySchema).optional(),
  status: StatusSchema.optional()
});

export type Presence = z.infer<typeof PresenceSchema>;

export function generatePresence(activity?: Activity, status?: Status): Presence {
  const presence: Presence = { since: Date.now(), afk: false };

  if (activity !== undefined) {
    presence.activities = [activity];
  }

  if (status !== undefined) {
    presence.status = status;
  }

  return presence;
}
