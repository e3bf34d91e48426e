import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { AuditLog } from '../../entities/audit-log.entity';
import { errorMessage } from '../../common/utils/error-message';

@Injectable()
export class AuditService {
  private readonly logger = new Logger(AuditService.name);

  constructor(
    @InjectRepository(AuditLog)
    private readonly auditRepo: Repository<AuditLog>,
  ) { }

  /**
   * Record a human-readable audit entry. Rejects if the entry could not be
   * stored; callers decide whether that should fail their operation.
   */
  async writeAuditLog(
    message: string,
    userId: string | null,
    workspaceId: string | null,
  ): Promise<AuditLog> {
    try {
      const entry = this.auditRepo.create({ message, userId, workspaceId });
      return await this.auditRepo.save(entry);
    } catch (err) {
      this.logger.error(`Failed to create audit log: ${errorMessage(err)}`);
      throw err;
    }
  }
}
