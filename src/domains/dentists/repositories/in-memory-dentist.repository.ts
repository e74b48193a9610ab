import { ConflictError, NotFoundError } from "@/shared/types/common.types";
import { CreateDentistData, Dentist, DentistListOptions, DentistPage, cloneDentist } from "../models/dentist.model";
import type { DentistRepository } from "./dentist.repository";

export class InMemoryDentistRepository implements DentistRepository {
  private readonly dentists = new Map<number, Dentist>();
  private nextId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async create(data: CreateDentistData): Promise<Dentist> {
    this.assertEmailFree(data.email);

    const timestamp = this.now();
    const dentist: Dentist = { ...data, id: this.nextId++, createdAt: timestamp, updatedAt: timestamp };
    this.dentists.set(dentist.id, cloneDentist(dentist));

    return cloneDentist(dentist);
  }

  async findById(id: number): Promise<Dentist | null> {
    const dentist = this.dentists.get(id);
    return dentist ? cloneDentist(dentist) : null;
  }

  async findByEmail(email: string): Promise<Dentist | null> {
    const dentist = this.findEmail(email);
    return dentist ? cloneDentist(dentist) : null;
  }

  async findAll(options: DentistListOptions): Promise<DentistPage> {
    const matching = Array.from(this.dentists.values())
      .filter((dentist) => !options.activeOnly || dentist.isActive)
      .sort((a, b) => a.name.localeCompare(b.name) || a.id - b.id);

    const offset = (options.page - 1) * options.pageSize;

    return {
      dentists: matching.slice(offset, offset + options.pageSize).map(cloneDentist),
      total: matching.length,
    };
  }

  async findActive(): Promise<Dentist[]> {
    return Array.from(this.dentists.values())
      .filter((dentist) => dentist.isActive)
      .sort((a, b) => a.name.localeCompare(b.name) || a.id - b.id)
      .map(cloneDentist);
  }

  async update(dentist: Dentist): Promise<Dentist> {
    if (!this.dentists.has(dentist.id)) {
      throw new NotFoundError(`Dentist with ID ${dentist.id} not found`);
    }
    this.assertEmailFree(dentist.email, dentist.id);

    this.dentists.set(dentist.id, cloneDentist(dentist));
    return cloneDentist(dentist);
  }

  async setUserId(id: number, userId: number): Promise<boolean> {
    const dentist = this.dentists.get(id);
    if (!dentist) {
      return false;
    }
    dentist.userId = userId;
    dentist.updatedAt = this.now();
    return true;
  }

  async delete(id: number): Promise<boolean> {
    return this.dentists.delete(id);
  }

  private findEmail(email: string): Dentist | undefined {
    const normalized = email.toLowerCase();
    return Array.from(this.dentists.values()).find((dentist) => dentist.email.toLowerCase() === normalized);
  }

  private assertEmailFree(email: string, ownId?: number): void {
    const existing = this.findEmail(email);
    if (existing && existing.id !== ownId) {
      throw new ConflictError(`A dentist with email '${email}' already exists.`);
    }
  }
}
