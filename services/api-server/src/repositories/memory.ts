import { randomUUID } from "node:crypto";
import type {
  NewPropertyRecord,
  NewSimulationRecord,
  PropertyFilters,
  PropertyRecord,
  PropertyRepository,
  SimulationKind,
  SimulationRecord,
  SimulationRepository,
} from "./types.js";

// Records are copied on the way in and out so callers never share state with the store
function clone<T>(value: T): T {
  return structuredClone(value);
}

export class InMemoryPropertyRepository implements PropertyRepository {
  private readonly records = new Map<string, PropertyRecord>();

  constructor(private readonly generateId: () => string = randomUUID) {}

  async create(record: NewPropertyRecord, now: string): Promise<PropertyRecord> {
    const created: PropertyRecord = { ...clone(record), id: this.generateId(), created_at: now, updated_at: now };
    this.records.set(created.id, created);
    return clone(created);
  }

  async findById(id: string): Promise<PropertyRecord | null> {
    const record = this.records.get(id);
    return record ? clone(record) : null;
  }

  async listByOwner(ownerId: string, filters: PropertyFilters = {}): Promise<PropertyRecord[]> {
    return Array.from(this.records.values())
      .filter((r) => r.owner_id === ownerId)
      .filter((r) => !filters.status || r.status === filters.status)
      .filter((r) => !filters.property_type || r.property_type === filters.property_type)
      .map(clone);
  }

  async update(id: string, changes: Partial<NewPropertyRecord>, now: string): Promise<PropertyRecord | null> {
    const existing = this.records.get(id);
    if (!existing) return null;
    const updated: PropertyRecord = { ...existing, ...clone(changes), id, updated_at: now };
    this.records.set(id, updated);
    return clone(updated);
  }

  async delete(id: string): Promise<boolean> {
    return this.records.delete(id);
  }
}

export class InMemorySimulationRepository implements SimulationRepository {
  private readonly records = new Map<string, SimulationRecord>();

  constructor(private readonly generateId: () => string = randomUUID) {}

  async create(record: NewSimulationRecord, now: string): Promise<SimulationRecord> {
    const created: SimulationRecord = {
      ...clone(record),
      id: this.generateId(),
      status: "draft",
      total_investment: null,
      total_cash_flow: null,
      final_property_value: null,
      total_return: null,
      roi: null,
      irr: null,
      npv: null,
      report: null,
      portfolio: null,
      warnings: [],
      error_message: null,
      created_at: now,
      completed_at: null,
    };
    this.records.set(created.id, created);
    return clone(created);
  }

  async findById(id: string): Promise<SimulationRecord | null> {
    const record = this.records.get(id);
    return record ? clone(record) : null;
  }

  async update(
    id: string,
    changes: Partial<Omit<SimulationRecord, "id" | "owner_id">>,
  ): Promise<SimulationRecord | null> {
    const existing = this.records.get(id);
    if (!existing) return null;
    const updated: SimulationRecord = { ...existing, ...clone(changes) };
    this.records.set(id, updated);
    return clone(updated);
  }

  async listByProperty(propertyId: string): Promise<SimulationRecord[]> {
    return this.newestFirst(Array.from(this.records.values()).filter((r) => r.property_id === propertyId));
  }

  async listByOwner(ownerId: string, kind: SimulationKind, limit?: number): Promise<SimulationRecord[]> {
    const matches = this.newestFirst(
      Array.from(this.records.values()).filter((r) => r.owner_id === ownerId && r.kind === kind),
    );
    return limit === undefined ? matches : matches.slice(0, limit);
  }

  async deleteByProperty(propertyId: string): Promise<number> {
    let removed = 0;
    for (const [id, record] of this.records) {
      if (record.property_id === propertyId) {
        this.records.delete(id);
        removed += 1;
      }
    }
    return removed;
  }

  // Insertion order breaks ties between records created in the same instant
  private newestFirst(records: SimulationRecord[]): SimulationRecord[] {
    return records
      .map((record, index) => ({ record, index }))
      .sort((a, b) => b.record.created_at.localeCompare(a.record.created_at) || b.index - a.index)
      .map(({ record }) => clone(record));
  }
}
