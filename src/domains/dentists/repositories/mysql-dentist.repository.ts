import { db, isDuplicateEntryError, RowDataPacket, SqlParam } from "@/shared/config/database";
import { createModuleLogger } from "@/shared/config/logger";
import { ConflictError, NotFoundError } from "@/shared/types/common.types";
import type { CreateDentistData, Dentist, DentistListOptions, DentistPage } from "../models/dentist.model";
import type { DentistRepository } from "./dentist.repository";

const moduleLogger = createModuleLogger("MySqlDentistRepository");

interface DentistRow extends RowDataPacket {
  id: number;
  name: string;
  email: string;
  phone: string | null;
  license_number: string;
  specialization: string | null;
  user_id: number | null;
  is_active: number;
  created_at: Date;
  updated_at: Date;
}

interface CountRow extends RowDataPacket {
  total: number;
}

const SELECT_COLUMNS = `
  SELECT id, name, email, phone, license_number, specialization, user_id, is_active, created_at, updated_at
  FROM dentists`;

const fromRow = (row: DentistRow): Dentist => ({
  id: row.id,
  name: row.name,
  email: row.email,
  phone: row.phone ?? "",
  licenseNumber: row.license_number,
  specialization: row.specialization ?? "",
  userId: row.user_id,
  isActive: row.is_active === 1,
  createdAt: new Date(row.created_at),
  updatedAt: new Date(row.updated_at),
});

export class MySqlDentistRepository implements DentistRepository {
  constructor(private readonly now: () => Date = () => new Date()) {}

  async create(data: CreateDentistData): Promise<Dentist> {
    const timestamp = this.now();

    try {
      const result = await db.execute(
        `INSERT INTO dentists (
          name, email, phone, license_number, specialization, user_id, is_active, created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          data.name,
          data.email,
          data.phone,
          data.licenseNumber,
          data.specialization,
          data.userId,
          data.isActive,
          timestamp,
          timestamp,
        ]
      );

      moduleLogger.info({ dentistId: result.insertId }, "Dentist created");
      return { ...data, id: result.insertId, createdAt: timestamp, updatedAt: timestamp };
    } catch (error) {
      if (isDuplicateEntryError(error)) {
        throw new ConflictError(`A dentist with email '${data.email}' already exists.`);
      }
      moduleLogger.error({ err: error, email: data.email }, "Error creating dentist");
      throw error;
    }
  }

  async findById(id: number): Promise<Dentist | null> {
    const row = await db.queryOne<DentistRow>(`${SELECT_COLUMNS} WHERE id = ?`, [id]);
    return row ? fromRow(row) : null;
  }

  async findByEmail(email: string): Promise<Dentist | null> {
    const row = await db.queryOne<DentistRow>(`${SELECT_COLUMNS} WHERE email = ?`, [email]);
    return row ? fromRow(row) : null;
  }

  async findAll(options: DentistListOptions): Promise<DentistPage> {
    const params: SqlParam[] = [];
    const where = options.activeOnly ? "WHERE is_active = 1" : "";
    const offset = (options.page - 1) * options.pageSize;

    const countRow = await db.queryOne<CountRow>(`SELECT COUNT(*) AS total FROM dentists ${where}`, params);
    const rows = await db.query<DentistRow>(
      `${SELECT_COLUMNS} ${where} ORDER BY name, id LIMIT ${Math.trunc(options.pageSize)} OFFSET ${Math.trunc(offset)}`,
      params
    );

    return { dentists: rows.map(fromRow), total: Number(countRow?.total ?? 0) };
  }

  async findActive(): Promise<Dentist[]> {
    const rows = await db.query<DentistRow>(`${SELECT_COLUMNS} WHERE is_active = 1 ORDER BY name, id`, []);
    return rows.map(fromRow);
  }

  async update(dentist: Dentist): Promise<Dentist> {
    try {
      const result = await db.execute(
        `UPDATE dentists
         SET name = ?, email = ?, phone = ?, license_number = ?, specialization = ?, user_id = ?,
             is_active = ?, updated_at = ?
         WHERE id = ?`,
        [
          dentist.name,
          dentist.email,
          dentist.phone,
          dentist.licenseNumber,
          dentist.specialization,
          dentist.userId,
          dentist.isActive,
          dentist.updatedAt,
          dentist.id,
        ]
      );

      if (result.affectedRows === 0) {
        throw new NotFoundError(`Dentist with ID ${dentist.id} not found`);
      }

      return { ...dentist };
    } catch (error) {
      if (isDuplicateEntryError(error)) {
        throw new ConflictError(`A dentist with email '${dentist.email}' already exists.`);
      }
      throw error;
    }
  }

  async setUserId(id: number, userId: number): Promise<boolean> {
    const result = await db.execute("UPDATE dentists SET user_id = ?, updated_at = ? WHERE id = ?", [
      userId,
      this.now(),
      id,
    ]);
    return result.affectedRows > 0;
  }

  async delete(id: number): Promise<boolean> {
    const result = await db.execute("DELETE FROM dentists WHERE id = ?", [id]);
    return result.affectedRows > 0;
  }
}
