import type { CreateDentistData, Dentist, DentistListOptions, DentistPage } from "../models/dentist.model";

export interface DentistRepository {
  /** @throws ConflictError when the email is already taken */
  create(data: CreateDentistData): Promise<Dentist>;
  findById(id: number): Promise<Dentist | null>;
  findByEmail(email: string): Promise<Dentist | null>;
  /** Ordered by name. */
  findAll(options: DentistListOptions): Promise<DentistPage>;
  /** Every active dentist, ordered by name. */
  findActive(): Promise<Dentist[]>;
  /** @throws NotFoundError for an unknown id, ConflictError when the email is already taken */
  update(dentist: Dentist): Promise<Dentist>;
  setUserId(id: number, userId: number): Promise<boolean>;
  delete(id: number): Promise<boolean>;
}
