import { Body, Controller, Get, HttpCode, HttpStatus, Logger, Param, Post, UseGuards } from '@nestjs/common';
import { OperatorGuard } from '../common/guards/operator.guard';
import { RunRegistrationDto } from './dto/run-registration.dto';
import { RegistrationOrchestrator } from './registration-orchestrator.service';
import { RegistrationQueueService } from './registration-queue.service';

@Controller('registration')
@UseGuards(OperatorGuard)
export class RegistrationController {
    private readonly logger = new Logger(RegistrationController.name);

    constructor(
        private readonly orchestrator: RegistrationOrchestrator,
        private readonly registrationQueue: RegistrationQueueService,
    ) {}

    @Get('status')
    async status() {
        return this.orchestrator.status();
    }

    /** Queues a batch; the worker runs it with the configured quota policy. */
    @Post('run')
    @HttpCode(HttpStatus.ACCEPTED)
    async run(@Body() body: RunRegistrationDto) {
        this.logger.log(`Operator requested a registration batch (limit ${body.limit ?? 'default'})`);
        const jobId = await this.registrationQueue.enqueueBatch('operator', body.limit);
        return { queued: true, jobId };
    }

    @Post(':referenceNumber')
    async registerOne(@Param('referenceNumber') referenceNumber: string) {
        this.logger.log(`Operator requested registration of ${referenceNumber}`);
        return this.orchestrator.registerOne(referenceNumber);
    }

    @Post(':referenceNumber/reset')
    async reset(@Param('referenceNumber') referenceNumber: string) {
        const product = await this.orchestrator.resetFailed(referenceNumber);
        return { referenceNumber: product.ReferenceNumber, publishStatus: product.PublishStatus };
    }
}
