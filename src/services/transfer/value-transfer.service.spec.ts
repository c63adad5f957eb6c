import { Test, TestingModule } from '@nestjs/testing';
import { getModelToken } from '@nestjs/mongoose';
import { ValueTransferService } from './value-transfer.service';
import { WalletPaymentGateway } from './wallet-payment.gateway';
import { BalanceService } from '../balance/balance.service';
import { User } from '../../models/user.schema';
import { PAYMENT_GATEWAY } from '../../common/constants';
import { LedgerType } from '../../common/enums/ledger-type.enum';
import { TransferContext } from './transfer.types';

describe('ValueTransferService', () => {
  let service: ValueTransferService;
  let gateway: any;

  const session: any = { id: 'session' };
  const context: TransferContext = {
    type: LedgerType.REFUND,
    referenceId: 'bid:0',
    description: 'Refund of outbid 100 on asset 0',
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ValueTransferService,
        {
          provide: PAYMENT_GATEWAY,
          useValue: { deliver: jest.fn() },
        },
      ],
    }).compile();

    service = module.get<ValueTransferService>(ValueTransferService);
    gateway = module.get(PAYMENT_GATEWAY);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should return the gateway result on delivery', async () => {
    gateway.deliver.mockResolvedValue({ ok: true });

    await expect(service.send('alice', 100, context, session)).resolves.toEqual({ ok: true });
    expect(gateway.deliver).toHaveBeenCalledWith('alice', 100, context, session);
    expect(gateway.deliver).toHaveBeenCalledTimes(1);
  });

  it('should pass a failed delivery through without retrying', async () => {
    gateway.deliver.mockResolvedValue({ ok: false, reason: 'account alice does not accept payments' });

    await expect(service.send('alice', 100, context, session)).resolves.toEqual({
      ok: false,
      reason: 'account alice does not accept payments',
    });
    expect(gateway.deliver).toHaveBeenCalledTimes(1);
  });

  it('should rethrow a gateway error instead of reporting a failed delivery', async () => {
    gateway.deliver.mockRejectedValue(new Error('write concern timeout'));

    await expect(service.send('alice', 100, context, session)).rejects.toThrow(
      'write concern timeout',
    );
    expect(gateway.deliver).toHaveBeenCalledTimes(1);
  });
});

describe('WalletPaymentGateway', () => {
  let gateway: WalletPaymentGateway;
  let userModel: any;
  let balanceService: any;

  const accountId = '65a1b2c3d4e5f6a7b8c9d0e1';
  const session: any = { id: 'session' };
  const context: TransferContext = {
    type: LedgerType.SALE_PROCEEDS,
    referenceId: 'sale:0',
    description: 'Sale of asset 0',
  };

  const withRecipient = (recipient: unknown) =>
    userModel.findById.mockReturnValue({
      session: jest.fn().mockReturnValue({
        exec: jest.fn().mockResolvedValue(recipient),
      }),
    });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        WalletPaymentGateway,
        {
          provide: getModelToken(User.name),
          useValue: { findById: jest.fn() },
        },
        {
          provide: BalanceService,
          useValue: { receive: jest.fn().mockResolvedValue({}) },
        },
      ],
    }).compile();

    gateway = module.get<WalletPaymentGateway>(WalletPaymentGateway);
    userModel = module.get(getModelToken(User.name));
    balanceService = module.get(BalanceService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should credit the recipient wallet', async () => {
    withRecipient({ _id: accountId, acceptsPayments: true });

    await expect(gateway.deliver(accountId, 500, context, session)).resolves.toEqual({ ok: true });
    expect(balanceService.receive).toHaveBeenCalledWith(
      accountId,
      500,
      LedgerType.SALE_PROCEEDS,
      'sale:0',
      'Sale of asset 0',
      session,
    );
  });

  it('should fail for an account that does not accept payments', async () => {
    withRecipient({ _id: accountId, acceptsPayments: false });

    await expect(gateway.deliver(accountId, 500, context, session)).resolves.toEqual({
      ok: false,
      reason: `account ${accountId} does not accept payments`,
    });
    expect(balanceService.receive).not.toHaveBeenCalled();
  });

  it('should fail for an unknown account', async () => {
    withRecipient(null);

    await expect(gateway.deliver(accountId, 500, context, session)).resolves.toEqual({
      ok: false,
      reason: `unknown account ${accountId}`,
    });
  });

  it('should fail without a lookup for ids that are not account ids', async () => {
    await expect(gateway.deliver('marketplace', 500, context, session)).resolves.toEqual({
      ok: false,
      reason: 'unknown account marketplace',
    });
    expect(userModel.findById).not.toHaveBeenCalled();
  });
});
