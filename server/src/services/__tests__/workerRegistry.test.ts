import { ShutdownCoordinator } from '../../utils/shutdownCoordinator.js';
import { startAllWorkers, stopAllWorkers } from '../workerRegistry.js';

function entry(name: string) {
    return { name, start: vi.fn(), stop: vi.fn() };
}

describe('workerRegistry', () => {
    it('starts workers and stops them through the coordinator', async () => {
        const coordinator = new ShutdownCoordinator();
        const worker = entry('reconciliationWorker');

        const started = startAllWorkers([worker], { disableWorkers: false, coordinator });
        await stopAllWorkers(coordinator);

        expect(started).toEqual(['reconciliationWorker']);
        expect(worker.start).toHaveBeenCalledTimes(1);
        expect(worker.stop).toHaveBeenCalledTimes(1);
    });

    it('starts nothing when background workers are disabled', () => {
        const coordinator = new ShutdownCoordinator();
        const worker = entry('reconciliationWorker');

        const started = startAllWorkers([worker], { disableWorkers: true, coordinator });

        expect(started).toEqual([]);
        expect(worker.start).not.toHaveBeenCalled();
        expect(coordinator.registeredNames()).toEqual([]);
    });
});
