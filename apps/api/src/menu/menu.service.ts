// apps/api/src/menu/menu.service.ts
import {
  ConflictException,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import { EntityManager } from 'typeorm';
import { AppLogger } from '../common/app-logger';
import { normalizeMoney } from '../common/utils/money';
import { MenuItem } from '../database/entities';
import {
  DatabaseService,
  isUniqueViolation,
} from '../database/database.service';
import { CreateMenuItemDto } from './dto/create-menu-item.dto';
import { UpdateMenuItemDto } from './dto/update-menu-item.dto';
import { MenuItemDto, toMenuItemDto } from './dto/menu-item.dto';

function nameTaken(name: string): ConflictException {
  return new ConflictException({
    code: 'MENU_ITEM_NAME_TAKEN',
    message: `Menu item "${name}" already exists`,
  });
}

@Injectable()
export class MenuService {
  private readonly logger = new AppLogger(MenuService.name);

  constructor(private readonly db: DatabaseService) {}

  /** GET /menu: what customers can order right now. */
  async listAvailable(): Promise<MenuItemDto[]> {
    const items = await this.db.manager.getRepository(MenuItem).find({
      where: { isAvailable: true },
      order: { name: 'ASC' },
    });
    return items.map(toMenuItemDto);
  }

  async getById(id: number): Promise<MenuItemDto> {
    const item = await this.db.manager
      .getRepository(MenuItem)
      .findOneBy({ id });
    if (!item) {
      throw new NotFoundException({
        code: 'MENU_ITEM_NOT_FOUND',
        message: `Menu item ${id} not found`,
      });
    }
    return toMenuItemDto(item);
  }

  async create(dto: CreateMenuItemDto): Promise<MenuItemDto> {
    const name = dto.name.trim();
    const repo = this.db.manager.getRepository(MenuItem);

    if (await repo.findOneBy({ name })) {
      throw nameTaken(name);
    }

    const entity = repo.create({
      name,
      description: dto.description ?? null,
      price: normalizeMoney(dto.price),
      isAvailable: dto.isAvailable ?? true,
      category: dto.category ?? null,
    });

    try {
      const saved = await repo.save(entity);
      this.logger.log(`menu item created id=${saved.id} name="${saved.name}"`);
      return toMenuItemDto(saved);
    } catch (err: unknown) {
      if (isUniqueViolation(err)) throw nameTaken(name);
      throw err;
    }
  }

  async update(id: number, dto: UpdateMenuItemDto): Promise<MenuItemDto> {
    const repo = this.db.manager.getRepository(MenuItem);
    const item = await repo.findOneBy({ id });
    if (!item) {
      throw new NotFoundException({
        code: 'MENU_ITEM_NOT_FOUND',
        message: `Menu item ${id} not found`,
      });
    }

    if (dto.name !== undefined) {
      const name = dto.name.trim();
      if (name !== item.name) {
        const clash = await repo.findOneBy({ name });
        if (clash && clash.id !== id) throw nameTaken(name);
        item.name = name;
      }
    }
    if (dto.description !== undefined) item.description = dto.description;
    if (dto.price !== undefined) item.price = normalizeMoney(dto.price);
    if (dto.isAvailable !== undefined) item.isAvailable = dto.isAvailable;
    if (dto.category !== undefined) item.category = dto.category;

    try {
      const saved = await repo.save(item);
      this.logger.log(
        `menu item updated id=${saved.id} price=${saved.price} available=${saved.isAvailable}`,
      );
      return toMenuItemDto(saved);
    } catch (err: unknown) {
      if (isUniqueViolation(err)) throw nameTaken(item.name);
      throw err;
    }
  }

  /**
   * Finds the first available item (lowest id) whose name contains `term`,
   * ignoring case. Plain substring containment, no fuzzy scoring.
   */
  async findAvailableByName(
    term: string,
    tx: EntityManager = this.db.manager,
  ): Promise<MenuItem | null> {
    const needle = term.trim().toLowerCase();
    if (!needle) return null;

    const candidates = await tx.getRepository(MenuItem).find({
      where: { isAvailable: true },
      order: { id: 'ASC' },
    });
    return (
      candidates.find((item) => item.name.toLowerCase().includes(needle)) ??
      null
    );
  }
}
