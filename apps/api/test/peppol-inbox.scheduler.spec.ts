import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { PeppolInboxScheduler } from '../src/peppol/peppol-inbox.scheduler';
import { PeppolService } from '../src/peppol/peppol.service';

describe('PeppolInboxScheduler', () => {
  const receiveInvoices = jest.fn();

  async function createScheduler(enabled: boolean | string): Promise<PeppolInboxScheduler> {
    const config = { get: jest.fn().mockReturnValue(enabled) };
    const moduleRef = await Test.createTestingModule({
      providers: [
        PeppolInboxScheduler,
        { provide: PeppolService, useValue: { receiveInvoices } },
        { provide: ConfigService, useValue: config },
      ],
    }).compile();

    return moduleRef.get(PeppolInboxScheduler);
  }

  beforeEach(() => {
    receiveInvoices.mockReset();
  });

  it('should not poll when disabled', async () => {
    const scheduler = await createScheduler(false);

    await scheduler.pollInbox();

    expect(receiveInvoices).not.toHaveBeenCalled();
  });

  it('should read the flag from a raw environment string', async () => {
    await (await createScheduler('false')).pollInbox();
    expect(receiveInvoices).not.toHaveBeenCalled();

    receiveInvoices.mockResolvedValue([]);
    await (await createScheduler('true')).pollInbox();
    expect(receiveInvoices).toHaveBeenCalledTimes(1);
  });

  it('should import the inbox when enabled', async () => {
    receiveInvoices.mockResolvedValue([{ messageId: 'msg-1', status: 'imported' }]);
    const scheduler = await createScheduler(true);

    await scheduler.pollInbox();

    expect(receiveInvoices).toHaveBeenCalledTimes(1);
  });

  it('should not overlap runs', async () => {
    let finish: () => void = () => undefined;
    receiveInvoices.mockReturnValue(
      new Promise(resolve => {
        finish = () => resolve([]);
      }),
    );
    const scheduler = await createScheduler(true);

    const first = scheduler.pollInbox();
    await scheduler.pollInbox();
    finish();
    await first;

    expect(receiveInvoices).toHaveBeenCalledTimes(1);
  });

  it('should log failures instead of throwing', async () => {
    receiveInvoices.mockRejectedValue(new Error('access point down'));
    const scheduler = await createScheduler(true);

    await expect(scheduler.pollInbox()).resolves.toBeUndefined();

    receiveInvoices.mockResolvedValue([]);
    await scheduler.pollInbox();
    expect(receiveInvoices).toHaveBeenCalledTimes(2);
  });
});
