// apps/api/src/customers/customers.service.ts
import {
  BadRequestException,
  ConflictException,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { EntityManager } from 'typeorm';
import { AppLogger } from '../common/app-logger';
import { normalizePhone } from '../common/utils/phone';
import { Customer, GUEST_NAME } from '../database/entities';
import {
  DatabaseService,
  isUniqueViolation,
} from '../database/database.service';
import { CreateCustomerDto } from './dto/create-customer.dto';
import { CustomerDto, toCustomerDto } from './dto/customer.dto';

export type EnsureCustomerInput = {
  name?: string | null;
  phone: string;
  address?: string | null;
};

function requirePhone(raw: string): string {
  const phone = normalizePhone(raw);
  if (!phone) {
    throw new BadRequestException({
      code: 'PHONE_REQUIRED',
      message: 'A phone number with at least one digit is required',
    });
  }
  return phone;
}

function phoneTaken(phone: string): ConflictException {
  return new ConflictException({
    code: 'CUSTOMER_PHONE_TAKEN',
    message: `Phone ${phone} is already registered`,
  });
}

function cleanText(value?: string | null): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

@Injectable()
export class CustomersService {
  private readonly logger = new AppLogger(CustomersService.name);

  constructor(private readonly db: DatabaseService) {}

  /**
   * Returns the customer owning `phone`, creating it on first sight.
   * A repeat call only ever touches the address, and only when a new,
   * non-empty, different one is supplied.
   */
  async ensureCustomer(
    tx: EntityManager,
    input: EnsureCustomerInput,
  ): Promise<Customer> {
    const phone = requirePhone(input.phone);
    const address = cleanText(input.address);
    const repo = tx.getRepository(Customer);

    const existing = await repo.findOneBy({ phone });
    if (existing) {
      if (address && address !== existing.address) {
        existing.address = address;
        return repo.save(existing);
      }
      return existing;
    }

    const created = await repo.save(
      repo.create({
        name: cleanText(input.name) ?? GUEST_NAME,
        phone,
        address,
        email: null,
      }),
    );
    this.logger.log(`customer created id=${created.id} via order`);
    return created;
  }

  /** POST /customers: 409 when the phone is already registered. */
  async create(dto: CreateCustomerDto): Promise<CustomerDto> {
    const phone = requirePhone(dto.phone);
    const repo = this.db.manager.getRepository(Customer);

    if (await repo.findOneBy({ phone })) {
      throw phoneTaken(phone);
    }

    try {
      const saved = await repo.save(
        repo.create({
          name: cleanText(dto.name) ?? GUEST_NAME,
          phone,
          email: cleanText(dto.email),
          address: cleanText(dto.address),
        }),
      );
      this.logger.log(`customer created id=${saved.id}`);
      return toCustomerDto(saved);
    } catch (err: unknown) {
      if (isUniqueViolation(err)) throw phoneTaken(phone);
      throw err;
    }
  }

  /** Most recently created first. */
  async list(): Promise<CustomerDto[]> {
    const customers = await this.db.manager.getRepository(Customer).find({
      order: { createdAt: 'DESC', id: 'DESC' },
    });
    return customers.map(toCustomerDto);
  }

  async getById(id: number): Promise<CustomerDto> {
    const customer = await this.db.manager
      .getRepository(Customer)
      .findOneBy({ id });
    if (!customer) {
      throw new NotFoundException({
        code: 'CUSTOMER_NOT_FOUND',
        message: `Customer ${id} not found`,
      });
    }
    return toCustomerDto(customer);
  }
}
