import { z } from "zod";

// Integration events exchanged with the authentication service

export const EventTypes = {
  DENTIST_CREATED: "dentistcreated",
  USER_CREATED: "UserCreated",
} as const;

export type EventType = (typeof EventTypes)[keyof typeof EventTypes];

export interface IntegrationEvent<TType extends string = string, TData = unknown> {
  eventType: TType;
  eventId: string;
  timestamp: string;
  data: TData;
}

export interface DentistCreatedEventData {
  dentistId: number;
  name: string;
  email: string;
  licenseNumber: string;
  specialization: string;
}

export type DentistCreatedEvent = IntegrationEvent<typeof EventTypes.DENTIST_CREATED, DentistCreatedEventData>;

export const userCreatedEventSchema = z.object({
  eventType: z.literal(EventTypes.USER_CREATED),
  eventId: z.string().min(1),
  timestamp: z.string(),
  data: z.object({
    userId: z.coerce.number().int().positive(),
    email: z.string().email(),
    role: z.string(),
    entityType: z.string().min(1),
    entityId: z.coerce.number().int().nonnegative(),
  }),
});

export type UserCreatedEvent = z.infer<typeof userCreatedEventSchema>;
export type UserCreatedEventData = UserCreatedEvent["data"];
