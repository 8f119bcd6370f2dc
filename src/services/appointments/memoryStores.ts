import { randomUUID } from "node:crypto";
import { DateRange, intervalsOverlap, TimeInterval } from "../../lib/time";
import { AppointmentOverlapError } from "./errors";
import { AppointmentStatus, blocksSchedule } from "./status";
import type {
  AppointmentStore,
  AvailabilityStore,
  SchedulingStores,
  ServiceCatalog,
  StatusChange,
  TherapistDirectory,
  TimeChange,
} from "./stores";
import type { Appointment, AvailabilityRule, NewAppointment, Service, Therapist } from "./types";

function copyAppointment(appointment: Appointment): Appointment {
  return {
    ...appointment,
    startsAt: new Date(appointment.startsAt),
    endsAt: new Date(appointment.endsAt),
    cancelledAt: appointment.cancelledAt ? new Date(appointment.cancelledAt) : null,
    createdAt: new Date(appointment.createdAt),
    updatedAt: new Date(appointment.updatedAt),
  };
}

export class InMemoryAvailabilityStore implements AvailabilityStore {
  private readonly rules: AvailabilityRule[];

  constructor(rules: AvailabilityRule[] = []) {
    this.rules = rules.map((rule) => ({ ...rule }));
  }

  async getRules(therapistId: string, range: DateRange): Promise<AvailabilityRule[]> {
    return this.rules
      .filter((rule) => rule.therapistId === therapistId)
      .filter((rule) => rule.kind === "recurring" || (rule.date >= range.from && rule.date < range.to))
      .map((rule) => ({ ...rule }));
  }

  /** Replaces the rule with the same key (override date or weekday). */
  upsert(rule: AvailabilityRule): void {
    const index = this.rules.findIndex((existing) => {
      if (existing.therapistId !== rule.therapistId || existing.kind !== rule.kind) {
        return false;
      }

      return existing.kind === "override" && rule.kind === "override"
        ? existing.date === rule.date
        : existing.kind === "recurring" && rule.kind === "recurring" && existing.weekday === rule.weekday;
    });

    if (index >= 0) {
      this.rules[index] = { ...rule };
      return;
    }

    this.rules.push({ ...rule });
  }
}

/**
 * Single-process store. Every method body runs synchronously after its first
 * line, so each check-then-write below is atomic with respect to other calls.
 */
export class InMemoryAppointmentStore implements AppointmentStore {
  private readonly rows = new Map<string, Appointment>();

  constructor(private readonly generateId: () => string = randomUUID) {}

  async getActiveForTherapist(
    therapistId: string,
    window: TimeInterval,
    excludeAppointmentId?: string
  ): Promise<TimeInterval[]> {
    return this.findBlocking(therapistId, window, excludeAppointmentId)
      .map((row) => ({ startMs: row.startsAt.getTime(), endMs: row.endsAt.getTime() }))
      .sort((a, b) => a.startMs - b.startMs);
  }

  async findById(id: string): Promise<Appointment | null> {
    const row = this.rows.get(id);
    return row ? copyAppointment(row) : null;
  }

  async listForTherapist(therapistId: string, window: TimeInterval): Promise<Appointment[]> {
    return [...this.rows.values()]
      .filter(
        (row) =>
          row.therapistId === therapistId &&
          intervalsOverlap(row.startsAt.getTime(), row.endsAt.getTime(), window.startMs, window.endMs)
      )
      .sort((a, b) => a.startsAt.getTime() - b.startsAt.getTime())
      .map(copyAppointment);
  }

  async listForClient(clientId: string): Promise<Appointment[]> {
    return [...this.rows.values()]
      .filter((row) => row.clientId === clientId)
      .sort((a, b) => b.startsAt.getTime() - a.startsAt.getTime())
      .map(copyAppointment);
  }

  async insert(appointment: NewAppointment): Promise<Appointment> {
    this.assertNoOverlap(appointment.therapistId, appointment.startsAt, appointment.endsAt);

    const now = new Date();
    const row: Appointment = {
      ...appointment,
      id: this.generateId(),
      startsAt: new Date(appointment.startsAt),
      endsAt: new Date(appointment.endsAt),
      status: AppointmentStatus.SCHEDULED,
      cancellationReason: null,
      cancelledAt: null,
      createdAt: now,
      updatedAt: now,
      version: 1,
    };

    this.rows.set(row.id, row);
    return copyAppointment(row);
  }

  async updateStatus(id: string, change: StatusChange): Promise<Appointment | null> {
    const row = this.rows.get(id);
    if (!row || row.version !== change.expectedVersion) {
      return null;
    }

    const isCancel = change.status === AppointmentStatus.CANCELLED;
    const updated: Appointment = {
      ...row,
      status: change.status,
      cancellationReason: isCancel ? change.cancellationReason ?? null : row.cancellationReason,
      cancelledAt: isCancel ? new Date(change.changedAt) : row.cancelledAt,
      updatedAt: new Date(change.changedAt),
      version: row.version + 1,
    };

    this.rows.set(id, updated);
    return copyAppointment(updated);
  }

  async updateTime(id: string, change: TimeChange): Promise<Appointment | null> {
    const row = this.rows.get(id);
    if (!row || row.version !== change.expectedVersion) {
      return null;
    }

    if (blocksSchedule(row.status)) {
      this.assertNoOverlap(row.therapistId, change.startsAt, change.endsAt, id);
    }

    const updated: Appointment = {
      ...row,
      startsAt: new Date(change.startsAt),
      endsAt: new Date(change.endsAt),
      updatedAt: new Date(change.changedAt),
      version: row.version + 1,
    };

    this.rows.set(id, updated);
    return copyAppointment(updated);
  }

  private findBlocking(therapistId: string, window: TimeInterval, excludeId?: string): Appointment[] {
    return [...this.rows.values()].filter(
      (row) =>
        row.therapistId === therapistId &&
        row.id !== excludeId &&
        blocksSchedule(row.status) &&
        intervalsOverlap(row.startsAt.getTime(), row.endsAt.getTime(), window.startMs, window.endMs)
    );
  }

  private assertNoOverlap(therapistId: string, startsAt: Date, endsAt: Date, excludeId?: string): void {
    const clashes = this.findBlocking(
      therapistId,
      { startMs: startsAt.getTime(), endMs: endsAt.getTime() },
      excludeId
    );

    if (clashes.length > 0) {
      throw new AppointmentOverlapError(therapistId, startsAt, endsAt);
    }
  }
}

export class InMemoryServiceCatalog implements ServiceCatalog {
  private readonly services: Map<string, Service>;

  constructor(services: Service[] = []) {
    this.services = new Map(services.map((service) => [service.id, { ...service }]));
  }

  async getService(serviceId: string): Promise<Service | null> {
    const service = this.services.get(serviceId);
    return service ? { ...service } : null;
  }
}

export class InMemoryTherapistDirectory implements TherapistDirectory {
  private readonly therapists: Map<string, Therapist>;

  constructor(therapists: Therapist[] = []) {
    this.therapists = new Map(
      therapists.map((therapist) => [therapist.id, { ...therapist, serviceIds: [...therapist.serviceIds] }])
    );
  }

  async getTherapist(therapistId: string): Promise<Therapist | null> {
    const therapist = this.therapists.get(therapistId);
    return therapist ? { ...therapist, serviceIds: [...therapist.serviceIds] } : null;
  }

  async listForService(serviceId: string): Promise<Therapist[]> {
    return [...this.therapists.values()]
      .filter((therapist) => therapist.serviceIds.includes(serviceId))
      .map((therapist) => ({ ...therapist, serviceIds: [...therapist.serviceIds] }));
  }
}

export type SchedulingSeed = {
  therapists: Therapist[];
  services: Service[];
  rules: AvailabilityRule[];
};

export type InMemorySchedulingStores = SchedulingStores & {
  availability: InMemoryAvailabilityStore;
  appointments: InMemoryAppointmentStore;
};

export function createInMemoryStores(
  seed: SchedulingSeed = { therapists: [], services: [], rules: [] }
): InMemorySchedulingStores {
  return {
    availability: new InMemoryAvailabilityStore(seed.rules),
    appointments: new InMemoryAppointmentStore(),
    services: new InMemoryServiceCatalog(seed.services),
    therapists: new InMemoryTherapistDirectory(seed.therapists),
  };
}
