import { db, isDuplicateEntryError, RowDataPacket, SqlParam } from "@/shared/config/database";
import { createModuleLogger } from "@/shared/config/logger";
import { ConflictError, NotFoundError } from "@/shared/types/common.types";
import type { CreateCustomerData, Customer, CustomerListOptions, CustomerPage } from "../models/customer.model";
import type { CustomerRepository } from "./customer.repository";

const moduleLogger = createModuleLogger("MySqlCustomerRepository");

interface CustomerRow extends RowDataPacket {
  id: number;
  name: string;
  email: string;
  phone: string | null;
  date_of_birth: Date | null;
  address: string | null;
  user_id: number | null;
  is_active: number;
  created_at: Date;
  updated_at: Date;
}

interface CountRow extends RowDataPacket {
  total: number;
}

const SELECT_COLUMNS = `
  SELECT id, name, email, phone, date_of_birth, address, user_id, is_active, created_at, updated_at
  FROM customers`;

const fromRow = (row: CustomerRow): Customer => ({
  id: row.id,
  name: row.name,
  email: row.email,
  phone: row.phone ?? "",
  dateOfBirth: row.date_of_birth ? new Date(row.date_of_birth) : null,
  address: row.address ?? "",
  userId: row.user_id,
  isActive: row.is_active === 1,
  createdAt: new Date(row.created_at),
  updatedAt: new Date(row.updated_at),
});

export class MySqlCustomerRepository implements CustomerRepository {
  constructor(private readonly now: () => Date = () => new Date()) {}

  async create(data: CreateCustomerData): Promise<Customer> {
    const timestamp = this.now();

    try {
      const result = await db.execute(
        `INSERT INTO customers (
          name, email, phone, date_of_birth, address, user_id, is_active, created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          data.name,
          data.email,
          data.phone,
          data.dateOfBirth,
          data.address,
          data.userId,
          data.isActive,
          timestamp,
          timestamp,
        ]
      );

      moduleLogger.info({ customerId: result.insertId }, "Customer created");
      return { ...data, id: result.insertId, createdAt: timestamp, updatedAt: timestamp };
    } catch (error) {
      if (isDuplicateEntryError(error)) {
        throw new ConflictError("A customer with this email already exists.");
      }
      moduleLogger.error({ err: error, email: data.email }, "Error creating customer");
      throw error;
    }
  }

  async findById(id: number): Promise<Customer | null> {
    const row = await db.queryOne<CustomerRow>(`${SELECT_COLUMNS} WHERE id = ?`, [id]);
    return row ? fromRow(row) : null;
  }

  async findByEmail(email: string): Promise<Customer | null> {
    const row = await db.queryOne<CustomerRow>(`${SELECT_COLUMNS} WHERE email = ?`, [email]);
    return row ? fromRow(row) : null;
  }

  async findAll(options: CustomerListOptions): Promise<CustomerPage> {
    const params: SqlParam[] = [];
    let where = "";

    const search = options.search?.trim();
    if (search) {
      const pattern = `%${search}%`;
      where = "WHERE name LIKE ? OR email LIKE ? OR phone LIKE ?";
      params.push(pattern, pattern, pattern);
    }

    const offset = (options.page - 1) * options.pageSize;
    const countRow = await db.queryOne<CountRow>(`SELECT COUNT(*) AS total FROM customers ${where}`, params);
    const rows = await db.query<CustomerRow>(
      `${SELECT_COLUMNS} ${where} ORDER BY name, id LIMIT ${Math.trunc(options.pageSize)} OFFSET ${Math.trunc(offset)}`,
      params
    );

    return { customers: rows.map(fromRow), total: Number(countRow?.total ?? 0) };
  }

  async update(customer: Customer): Promise<Customer> {
    try {
      const result = await db.execute(
        `UPDATE customers
         SET name = ?, email = ?, phone = ?, date_of_birth = ?, address = ?, user_id = ?, is_active = ?, updated_at = ?
         WHERE id = ?`,
        [
          customer.name,
          customer.email,
          customer.phone,
          customer.dateOfBirth,
          customer.address,
          customer.userId,
          customer.isActive,
          customer.updatedAt,
          customer.id,
        ]
      );

      if (result.affectedRows === 0) {
        throw new NotFoundError(`Customer with ID ${customer.id} not found`);
      }

      return { ...customer };
    } catch (error) {
      if (isDuplicateEntryError(error)) {
        throw new ConflictError("A customer with this email already exists.");
      }
      throw error;
    }
  }

  async setUserId(id: number, userId: number): Promise<boolean> {
    const result = await db.execute("UPDATE customers SET user_id = ?, updated_at = ? WHERE id = ?", [
      userId,
      this.now(),
      id,
    ]);
    return result.affectedRows > 0;
  }

  async delete(id: number): Promise<boolean> {
    const result = await db.execute("DELETE FROM customers WHERE id = ?", [id]);
    return result.affectedRows > 0;
  }
}
