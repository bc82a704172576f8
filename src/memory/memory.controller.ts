import {
  Body,
  Controller,
  Post,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { MemoryService } from './memory.service';
import { MemoryAddDto, MemorySearchDto } from './memory.dto';
import { memoryNamespace } from './memory.types';
import { StoreError } from '../common/errors';

@ApiTags('memory')
@Controller('memory')
export class MemoryController {
  constructor(private readonly memory: MemoryService) {}

  @Post('add')
  async add(@Body() dto: MemoryAddDto) {
    const namespace = memoryNamespace(dto.userId, dto.profileId);
    const id = await this.guard(
      this.memory.add(namespace, dto.text, {
        source: dto.source,
        type: dto.type,
        importance: dto.importance,
        tags: dto.tags,
      }),
    );
    return { id, namespace };
  }

  @Post('search')
  async search(@Body() dto: MemorySearchDto) {
    const namespace = memoryNamespace(dto.userId, dto.profileId);
    const topK = dto.topK ?? this.memory.defaultTopK;
    const results = await this.guard(
      this.memory.search(namespace, dto.query, topK),
    );
    return { namespace, topK, results };
  }

  private async guard<T>(operation: Promise<T>): Promise<T> {
    try {
      return await operation;
    } catch (error) {
      if (error instanceof StoreError) {
        throw new ServiceUnavailableException(error.message);
      }
      throw error;
    }
  }
}
