import { db } from "@/shared/config/database";
import { logger } from "@/shared/config/logger";
import { CreateCustomerData, MySqlCustomerRepository } from "@/domains/customers";
import { CreateDentistData, MySqlDentistRepository } from "@/domains/dentists";

const customers: CreateCustomerData[] = [
  {
    name: "Maria Lopez",
    email: "maria.lopez@example.com",
    phone: "555-0101",
    dateOfBirth: new Date(Date.UTC(1988, 4, 12)),
    address: "12 Harbor Street",
    userId: null,
    isActive: true,
  },
  {
    name: "Daniel Park",
    email: "daniel.park@example.com",
    phone: "555-0102",
    dateOfBirth: new Date(Date.UTC(1975, 10, 3)),
    address: "48 Cedar Avenue",
    userId: null,
    isActive: true,
  },
  {
    name: "Amara Okafor",
    email: "amara.okafor@example.com",
    phone: "555-0103",
    dateOfBirth: null,
    address: "",
    userId: null,
    isActive: true,
  },
];

const dentists: CreateDentistData[] = [
  {
    name: "Helen Brooks",
    email: "helen.brooks@example.com",
    phone: "555-0201",
    licenseNumber: "DDS-1001",
    specialization: "General Dentistry",
    userId: null,
    isActive: true,
  },
  {
    name: "Samuel Reyes",
    email: "samuel.reyes@example.com",
    phone: "555-0202",
    licenseNumber: "DDS-1002",
    specialization: "Orthodontics",
    userId: null,
    isActive: true,
  },
  {
    name: "Priya Nair",
    email: "priya.nair@example.com",
    phone: "555-0203",
    licenseNumber: "DDS-1003",
    specialization: "Endodontics",
    userId: null,
    isActive: true,
  },
];

class DatabaseSeeder {
  private customerRepository = new MySqlCustomerRepository();
  private dentistRepository = new MySqlDentistRepository();

  async run(): Promise<void> {
    logger.info("Starting database seeding...");

    const existing = await this.dentistRepository.findAll({ page: 1, pageSize: 1 });
    if (existing.total > 0) {
      logger.info("Database already contains data, skipping seed");
      return;
    }

    await this.seedCustomers();
    await this.seedDentists();

    logger.info("Database seeding completed successfully");
  }

  private async seedCustomers(): Promise<void> {
    for (const customer of customers) {
      await this.customerRepository.create(customer);
    }
    logger.info(`Seeded ${customers.length} customers`);
  }

  private async seedDentists(): Promise<void> {
    for (const dentist of dentists) {
      await this.dentistRepository.create(dentist);
    }
    logger.info(`Seeded ${dentists.length} dentists`);
  }
}

async function main(): Promise<void> {
  try {
    await new DatabaseSeeder().run();
  } finally {
    await db.close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error({ err: error }, "Seeding failed");
    process.exit(1);
  });
}
