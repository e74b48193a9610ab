import { config } from "@/shared/config/environment";
import { createModuleLogger } from "@/shared/config/logger";
import { RedisManager } from "@/shared/config/redis";
import { EventBus } from "@/shared/events/event-bus";
import { InProcessMessageBroker, MessageBroker } from "@/shared/events/message-broker";
import {
  AppointmentController,
  AppointmentRepository,
  AppointmentService,
  ConflictCheckerService,
  DEFAULT_BUSINESS_CALENDAR,
  InMemoryAppointmentRepository,
  MySqlAppointmentRepository,
} from "@/domains/appointments";
import {
  CustomerController,
  CustomerRepository,
  CustomerService,
  InMemoryCustomerRepository,
  MySqlCustomerRepository,
} from "@/domains/customers";
import {
  DentistController,
  DentistRepository,
  DentistService,
  InMemoryDentistRepository,
  MySqlDentistRepository,
} from "@/domains/dentists";
import {
  AuthApiClient,
  HttpAuthApiClient,
  IdentityEventConsumer,
  LocalAuthApiClient,
  UserController,
  UserCreatedHandler,
  UserManagementService,
} from "@/domains/identity";
import { EmailService, LoggingEmailService, SmtpEmailService } from "@/domains/notifications/services/email.service";

const moduleLogger = createModuleLogger("Container");

export type DatabaseProvider = typeof config.database.provider;

export interface ContainerOptions {
  databaseProvider?: DatabaseProvider;
  now?: () => Date;
  appointmentRepository?: AppointmentRepository;
  customerRepository?: CustomerRepository;
  dentistRepository?: DentistRepository;
  emailService?: EmailService;
  authApiClient?: AuthApiClient;
  broker?: MessageBroker;
}

export interface Container {
  databaseProvider: DatabaseProvider;
  broker: MessageBroker;
  eventBus: EventBus;
  repositories: {
    appointments: AppointmentRepository;
    customers: CustomerRepository;
    dentists: DentistRepository;
  };
  services: {
    conflictChecker: ConflictCheckerService;
    appointments: AppointmentService;
    customers: CustomerService;
    dentists: DentistService;
    userManagement: UserManagementService;
    email: EmailService;
    authApi: AuthApiClient;
  };
  controllers: {
    appointments: AppointmentController;
    customers: CustomerController;
    dentists: DentistController;
    users: UserController;
  };
  identityConsumer: IdentityEventConsumer;
}

const createRepositories = (provider: DatabaseProvider, now: () => Date) =>
  provider === "mysql"
    ? {
        appointments: new MySqlAppointmentRepository(now),
        customers: new MySqlCustomerRepository(now),
        dentists: new MySqlDentistRepository(now),
      }
    : {
        appointments: new InMemoryAppointmentRepository(now),
        customers: new InMemoryCustomerRepository(now),
        dentists: new InMemoryDentistRepository(now),
      };

/** Wires every collaborator from configuration; any of them can be replaced through `options`. */
export const createContainer = (options: ContainerOptions = {}): Container => {
  const databaseProvider = options.databaseProvider ?? config.database.provider;
  const now = options.now ?? (() => new Date());

  const defaults = createRepositories(databaseProvider, now);
  const repositories = {
    appointments: options.appointmentRepository ?? defaults.appointments,
    customers: options.customerRepository ?? defaults.customers,
    dentists: options.dentistRepository ?? defaults.dentists,
  };

  const broker = options.broker ?? (config.redis.enabled ? new RedisManager() : new InProcessMessageBroker());
  const eventBus = new EventBus(broker);

  const email = options.emailService ?? (config.email.enabled ? new SmtpEmailService() : new LoggingEmailService());
  const authApi = options.authApiClient ?? (config.authApi.enabled ? new HttpAuthApiClient() : new LocalAuthApiClient());

  const conflictChecker = new ConflictCheckerService(repositories.appointments, DEFAULT_BUSINESS_CALENDAR, now);
  const appointments = new AppointmentService(
    repositories.appointments,
    repositories.customers,
    repositories.dentists,
    conflictChecker,
    email,
    now
  );
  const customers = new CustomerService(repositories.customers, authApi, email, now);
  const dentists = new DentistService(repositories.dentists, eventBus, now);
  const userManagement = new UserManagementService(authApi, repositories.customers, repositories.dentists);

  const identityConsumer = new IdentityEventConsumer(
    broker,
    new UserCreatedHandler(repositories.customers, repositories.dentists)
  );

  moduleLogger.debug(
    { databaseProvider, broker: broker.constructor.name, email: email.constructor.name },
    "Container created"
  );

  return {
    databaseProvider,
    broker,
    eventBus,
    repositories,
    services: { conflictChecker, appointments, customers, dentists, userManagement, email, authApi },
    controllers: {
      appointments: new AppointmentController(appointments),
      customers: new CustomerController(customers),
      dentists: new DentistController(dentists),
      users: new UserController(userManagement),
    },
    identityConsumer,
  };
};
