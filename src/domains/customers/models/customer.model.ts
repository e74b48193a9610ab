export interface Customer {
  id: number;
  name: string;
  email: string;
  phone: string;
  dateOfBirth: Date | null;
  address: string;
  userId: number | null;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type CreateCustomerData = Omit<Customer, "id" | "createdAt" | "updatedAt">;

export interface CustomerListOptions {
  page: number;
  pageSize: number;
  search?: string | undefined;
}

export interface CustomerPage {
  customers: Customer[];
  total: number;
}

export const cloneCustomer = (customer: Customer): Customer => ({
  ...customer,
  dateOfBirth: customer.dateOfBirth ? new Date(customer.dateOfBirth.getTime()) : null,
  createdAt: new Date(customer.createdAt.getTime()),
  updatedAt: new Date(customer.updatedAt.getTime()),
});

export interface CustomerInput {
  name: string;
  email: string;
  phone: string;
  dateOfBirth?: Date | null | undefined;
  address?: string | undefined;
  isActive?: boolean | undefined;
}
