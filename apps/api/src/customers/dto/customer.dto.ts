import type { Customer } from '../../database/entities';

export type CustomerDto = {
  id: number;
  name: string;
  phone: string;
  email: string | null;
  address: string | null;
  createdAt: Date;
};

export function toCustomerDto(customer: Customer): CustomerDto {
  return {
    id: customer.id,
    name: customer.name,
    phone: customer.phone,
    email: customer.email ?? null,
    address: customer.address ?? null,
    createdAt: customer.createdAt,
  };
}
