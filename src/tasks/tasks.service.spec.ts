import { Test } from '@nestjs/testing';
import { CATALOG_STORE } from '../catalog/catalog.types';
import { buildProduct, InMemoryCatalog } from '../catalog/testing/in-memory-catalog';
import { ActivityLogEntry, ActivityLogService } from '../common/activity-log.service';
import { createRecordingActivityLog } from '../common/testing/activity-log.testing';
import { PipelineConfig, pipelineConfig } from '../config/pipeline.config';
import { testPipelineConfig } from '../config/testing/config.fixtures';
import { RegistrationQueueService } from '../registration/registration-queue.service';
import { ReconciliationQueueService } from '../sync-engine/reconciliation-queue.service';
import { TasksService } from './tasks.service';

const HOUR_MS = 60 * 60 * 1000;

describe('TasksService', () => {
    let catalog: InMemoryCatalog;
    let entries: ActivityLogEntry[];
    let registrationSchedule: jest.Mock;
    let reconciliationSchedule: jest.Mock;

    async function createService(pipeline: Partial<PipelineConfig> = {}): Promise<TasksService> {
        const activity = createRecordingActivityLog();
        entries = activity.entries;
        const moduleRef = await Test.createTestingModule({
            providers: [
                TasksService,
                { provide: CATALOG_STORE, useValue: catalog },
                { provide: ActivityLogService, useValue: activity.service },
                { provide: pipelineConfig.KEY, useValue: testPipelineConfig(pipeline) },
                { provide: RegistrationQueueService, useValue: { scheduleRepeating: registrationSchedule } },
                { provide: ReconciliationQueueService, useValue: { scheduleRepeating: reconciliationSchedule } },
            ],
        }).compile();
        return moduleRef.get(TasksService);
    }

    beforeEach(() => {
        catalog = new InMemoryCatalog();
        registrationSchedule = jest.fn().mockResolvedValue(undefined);
        reconciliationSchedule = jest.fn().mockResolvedValue(undefined);
    });

    it('schedules reconciliation and leaves registration unscheduled by default', async () => {
        const service = await createService();

        await service.syncSchedules();

        expect(reconciliationSchedule).toHaveBeenCalledWith('0 */30 * * * *');
        expect(registrationSchedule).toHaveBeenCalledWith(null);
    });

    it('schedules registration batches when enabled', async () => {
        const service = await createService({ registrationCronEnabled: true, registrationCron: '0 15 * * * *' });

        await service.syncSchedules();

        expect(registrationSchedule).toHaveBeenCalledWith('0 15 * * * *');
    });

    it('reports submissions that have waited too long for confirmation', async () => {
        const now = Date.now();
        catalog.seed({
            product: buildProduct({
                Id: 1,
                ReferenceNumber: 'REF-1',
                PublishStatus: 'pending_confirmation',
                RequestUid: 'uid-1',
                RegisteredAt: new Date(now - 48 * HOUR_MS).toISOString(),
            }),
        });
        catalog.seed({
            product: buildProduct({
                Id: 2,
                ReferenceNumber: 'REF-2',
                PublishStatus: 'pending_confirmation',
                RegisteredAt: new Date(now - HOUR_MS).toISOString(),
            }),
        });
        catalog.seed({
            product: buildProduct({
                Id: 3,
                ReferenceNumber: 'REF-3',
                PublishStatus: 'published',
                RegisteredAt: new Date(now - 48 * HOUR_MS).toISOString(),
            }),
        });
        const service = await createService();

        const reported = await service.reportStalePendingConfirmations();

        expect(reported).toBe(1);
        expect(entries).toHaveLength(1);
        expect(entries[0]).toMatchObject({
            EntityType: 'Product',
            EntityId: 'REF-1',
            EventType: 'PENDING_CONFIRMATION_STALE',
            Status: 'NeedsAttention',
        });
    });

    it('keeps running when the catalog lookup fails', async () => {
        jest.spyOn(catalog, 'findStalePending').mockRejectedValue(new Error('connection reset'));
        const service = await createService();

        await expect(service.reportStalePendingConfirmations()).resolves.toBe(0);
        expect(entries).toHaveLength(0);
    });
});
