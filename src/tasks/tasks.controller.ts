import { Body, Controller, HttpCode, HttpStatus, Logger, Post, UseGuards } from '@nestjs/common';
import { OperatorGuard } from '../common/guards/operator.guard';
import { ReconciliationQueueService } from '../sync-engine/reconciliation-queue.service';
import { RunReconciliationDto } from './dto/run-reconciliation.dto';

@Controller('tasks')
@UseGuards(OperatorGuard)
export class TasksController {
  private readonly logger = new Logger(TasksController.name);

  constructor(private readonly reconciliationQueue: ReconciliationQueueService) {}

  /** Queues a reconciliation pass outside the schedule. */
  @Post('reconcile')
  @HttpCode(HttpStatus.ACCEPTED)
  async reconcile(@Body() body: RunReconciliationDto) {
    this.logger.log(`Operator requested a reconciliation pass (limit ${body.limit ?? 'default'})`);
    const jobId = await this.reconciliationQueue.enqueuePass('operator', body.limit);
    return { queued: true, jobId };
  }
}
