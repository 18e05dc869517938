import type { MenuItem } from '../../database/entities';

export type MenuItemDto = {
  id: number;
  name: string;
  description: string | null;
  price: string;
  isAvailable: boolean;
  category: string | null;
};

export function toMenuItemDto(item: MenuItem): MenuItemDto {
  return {
    id: item.id,
    name: item.name,
    description: item.description ?? null,
    price: item.price,
    isAvailable: item.isAvailable,
    category: item.category ?? null,
  };
}
