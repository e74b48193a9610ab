import { db, isDuplicateEntryError, RowDataPacket, SqlParam } from "@/shared/config/database";
import { createModuleLogger } from "@/shared/config/logger";
import { NotFoundError } from "@/shared/types/common.types";
import {
  Appointment,
  AppointmentFilters,
  AppointmentPage,
  AppointmentStatus,
  CreateAppointmentData,
} from "../models/appointment.model";
import { AppointmentRepository, DuplicateSlotError } from "./appointment.repository";

const moduleLogger = createModuleLogger("MySqlAppointmentRepository");

interface AppointmentRow extends RowDataPacket {
  id: number;
  customer_id: number;
  dentist_id: number;
  appointment_date_time: Date;
  procedure_type: string;
  notes: string | null;
  status: string;
  created_at: Date;
  updated_at: Date;
}

interface CountRow extends RowDataPacket {
  total: number;
}

const SELECT_COLUMNS = `
  SELECT id, customer_id, dentist_id, appointment_date_time, procedure_type, notes, status, created_at, updated_at
  FROM appointments`;

const STATUSES: readonly AppointmentStatus[] = Object.values(AppointmentStatus);

const toStatus = (value: string): AppointmentStatus => {
  const status = STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new Error(`Unknown appointment status '${value}'`);
  }
  return status;
};

const fromRow = (row: AppointmentRow): Appointment => ({
  id: row.id,
  customerId: row.customer_id,
  dentistId: row.dentist_id,
  appointmentDateTime: new Date(row.appointment_date_time),
  procedureType: row.procedure_type,
  notes: row.notes ?? "",
  status: toStatus(row.status),
  createdAt: new Date(row.created_at),
  updatedAt: new Date(row.updated_at),
});

// Maps a unique-index violation onto the slot owner named by the index
const translateDuplicate = (error: unknown): unknown => {
  if (!isDuplicateEntryError(error)) {
    return error;
  }
  if (error.message.includes("uq_appointments_customer_slot")) {
    return new DuplicateSlotError("customer");
  }
  if (error.message.includes("uq_appointments_dentist_slot")) {
    return new DuplicateSlotError("dentist");
  }
  return error;
};

export class MySqlAppointmentRepository implements AppointmentRepository {
  constructor(private readonly now: () => Date = () => new Date()) {}

  async create(data: CreateAppointmentData): Promise<Appointment> {
    const timestamp = this.now();

    try {
      const result = await db.execute(
        `INSERT INTO appointments (
          customer_id, dentist_id, appointment_date_time, procedure_type, notes, status, created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          data.customerId,
          data.dentistId,
          data.appointmentDateTime,
          data.procedureType,
          data.notes,
          data.status,
          timestamp,
          timestamp,
        ]
      );

      moduleLogger.info(
        { appointmentId: result.insertId, customerId: data.customerId, dentistId: data.dentistId },
        "Appointment created"
      );

      return { ...data, id: result.insertId, createdAt: timestamp, updatedAt: timestamp };
    } catch (error) {
      const translated = translateDuplicate(error);
      if (!(translated instanceof DuplicateSlotError)) {
        moduleLogger.error({ err: error }, "Error creating appointment");
      }
      throw translated;
    }
  }

  async findById(id: number): Promise<Appointment | null> {
    const row = await db.queryOne<AppointmentRow>(`${SELECT_COLUMNS} WHERE id = ?`, [id]);
    return row ? fromRow(row) : null;
  }

  async findByCustomerId(customerId: number): Promise<Appointment[]> {
    const rows = await db.query<AppointmentRow>(
      `${SELECT_COLUMNS} WHERE customer_id = ? ORDER BY appointment_date_time, id`,
      [customerId]
    );
    return rows.map(fromRow);
  }

  async findByDentistId(dentistId: number): Promise<Appointment[]> {
    const rows = await db.query<AppointmentRow>(
      `${SELECT_COLUMNS} WHERE dentist_id = ? ORDER BY appointment_date_time, id`,
      [dentistId]
    );
    return rows.map(fromRow);
  }

  async findByDateRange(startDate: Date, endDate: Date): Promise<Appointment[]> {
    const rows = await db.query<AppointmentRow>(
      `${SELECT_COLUMNS}
       WHERE appointment_date_time >= ? AND appointment_date_time <= ?
       ORDER BY appointment_date_time, id`,
      [startDate, endDate]
    );
    return rows.map(fromRow);
  }

  async findAll(filters: AppointmentFilters): Promise<AppointmentPage> {
    const conditions: string[] = [];
    const params: SqlParam[] = [];

    if (filters.customerId !== undefined) {
      conditions.push("customer_id = ?");
      params.push(filters.customerId);
    }
    if (filters.dentistId !== undefined) {
      conditions.push("dentist_id = ?");
      params.push(filters.dentistId);
    }
    if (filters.startDate !== undefined) {
      conditions.push("appointment_date_time >= ?");
      params.push(filters.startDate);
    }
    if (filters.endDate !== undefined) {
      conditions.push("appointment_date_time <= ?");
      params.push(filters.endDate);
    }
    if (filters.status !== undefined) {
      conditions.push("status = ?");
      params.push(filters.status);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const offset = (filters.page - 1) * filters.pageSize;

    const countRow = await db.queryOne<CountRow>(`SELECT COUNT(*) AS total FROM appointments ${where}`, params);
    // LIMIT/OFFSET are inlined: some MySQL servers reject them as prepared-statement placeholders
    const rows = await db.query<AppointmentRow>(
      `${SELECT_COLUMNS} ${where} ORDER BY appointment_date_time, id LIMIT ${Math.trunc(filters.pageSize)} OFFSET ${Math.trunc(offset)}`,
      params
    );

    return {
      appointments: rows.map(fromRow),
      total: Number(countRow?.total ?? 0),
    };
  }

  async hasCustomerConflict(customerId: number, dateTime: Date, excludeId?: number): Promise<boolean> {
    return this.hasConflict("customer_id", customerId, dateTime, excludeId);
  }

  async hasDentistConflict(dentistId: number, dateTime: Date, excludeId?: number): Promise<boolean> {
    return this.hasConflict("dentist_id", dentistId, dateTime, excludeId);
  }

  async update(appointment: Appointment): Promise<Appointment> {
    try {
      const result = await db.execute(
        `UPDATE appointments
         SET customer_id = ?, dentist_id = ?, appointment_date_time = ?, procedure_type = ?,
             notes = ?, status = ?, updated_at = ?
         WHERE id = ?`,
        [
          appointment.customerId,
          appointment.dentistId,
          appointment.appointmentDateTime,
          appointment.procedureType,
          appointment.notes,
          appointment.status,
          appointment.updatedAt,
          appointment.id,
        ]
      );

      if (result.affectedRows === 0) {
        throw new NotFoundError(`Appointment with ID ${appointment.id} not found`);
      }

      return { ...appointment };
    } catch (error) {
      const translated = translateDuplicate(error);
      if (!(translated instanceof DuplicateSlotError) && !(translated instanceof NotFoundError)) {
        moduleLogger.error({ err: error, appointmentId: appointment.id }, "Error updating appointment");
      }
      throw translated;
    }
  }

  async delete(id: number): Promise<boolean> {
    const result = await db.execute("DELETE FROM appointments WHERE id = ?", [id]);
    return result.affectedRows > 0;
  }

  private async hasConflict(
    column: "customer_id" | "dentist_id",
    ownerId: number,
    dateTime: Date,
    excludeId?: number
  ): Promise<boolean> {
    const params: SqlParam[] = [ownerId, dateTime, AppointmentStatus.CANCELLED];
    let sql = `SELECT COUNT(*) AS total FROM appointments
               WHERE ${column} = ? AND appointment_date_time = ? AND status <> ?`;

    if (excludeId !== undefined) {
      sql += " AND id <> ?";
      params.push(excludeId);
    }

    const row = await db.queryOne<CountRow>(sql, params);
    return Number(row?.total ?? 0) > 0;
  }
}
