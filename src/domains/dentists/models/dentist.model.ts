export interface Dentist {
  id: number;
  name: string;
  email: string;
  phone: string;
  licenseNumber: string;
  specialization: string;
  userId: number | null;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type CreateDentistData = Omit<Dentist, "id" | "createdAt" | "updatedAt">;

export interface DentistListOptions {
  page: number;
  pageSize: number;
  activeOnly?: boolean | undefined;
}

export interface DentistPage {
  dentists: Dentist[];
  total: number;
}

export const cloneDentist = (dentist: Dentist): Dentist => ({
  ...dentist,
  createdAt: new Date(dentist.createdAt.getTime()),
  updatedAt: new Date(dentist.updatedAt.getTime()),
});

export interface DentistInput {
  name: string;
  email: string;
  phone: string;
  licenseNumber: string;
  specialization: string;
  isActive?: boolean | undefined;
}
