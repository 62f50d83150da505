import type {
  PortfolioSimulationResult,
  PropertyFinancialsInput,
  PropertyStatus,
  PropertyType,
  SimulationReport,
} from "@propyield/roi-engine";

export interface PropertyDetails {
  name: string;
  description: string | null;
  status: PropertyStatus;
  address: string;
  city: string | null;
  state: string | null;
  zip_code: string | null;
  country: string;
  property_type: PropertyType;
  bedrooms: number | null;
  bathrooms: number | null;
  square_feet: number | null;
  lot_size: number | null;
  year_built: number | null;
  security_deposit: number | null;
  purchased_date: string | null;
}

export interface PropertyRecord extends PropertyDetails, PropertyFinancialsInput {
  id: string;
  owner_id: string;
  created_at: string;
  updated_at: string;
}

export type NewPropertyRecord = Omit<PropertyRecord, "id" | "created_at" | "updated_at">;

export interface PropertyFilters {
  status?: PropertyStatus;
  property_type?: PropertyType;
}

export type SimulationKind = "property" | "portfolio";
export type SimulationStatus = "draft" | "running" | "completed" | "failed";

export interface SimulationRecord {
  id: string;
  owner_id: string;
  property_id: string | null;
  kind: SimulationKind;
  status: SimulationStatus;
  params: Record<string, unknown>;
  total_investment: number | null;
  total_cash_flow: number | null;
  final_property_value: number | null;
  total_return: number | null;
  roi: number | null;
  irr: number | null;
  npv: number | null;
  report: SimulationReport | null;
  portfolio: PortfolioSimulationResult | null;
  warnings: string[];
  error_message: string | null;
  created_at: string;
  completed_at: string | null;
}

export type NewSimulationRecord = Pick<SimulationRecord, "owner_id" | "property_id" | "kind" | "params">;

export interface PropertyRepository {
  create(record: NewPropertyRecord, now: string): Promise<PropertyRecord>;
  findById(id: string): Promise<PropertyRecord | null>;
  listByOwner(ownerId: string, filters?: PropertyFilters): Promise<PropertyRecord[]>;
  update(id: string, changes: Partial<NewPropertyRecord>, now: string): Promise<PropertyRecord | null>;
  delete(id: string): Promise<boolean>;
}

export interface SimulationRepository {
  create(record: NewSimulationRecord, now: string): Promise<SimulationRecord>;
  findById(id: string): Promise<SimulationRecord | null>;
  update(id: string, changes: Partial<Omit<SimulationRecord, "id" | "owner_id">>): Promise<SimulationRecord | null>;
  listByProperty(propertyId: string): Promise<SimulationRecord[]>;
  listByOwner(ownerId: string, kind: SimulationKind, limit?: number): Promise<SimulationRecord[]>;
  deleteByProperty(propertyId: string): Promise<number>;
}
