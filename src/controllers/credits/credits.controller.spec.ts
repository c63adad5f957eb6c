import { Test, TestingModule } from '@nestjs/testing';
import { ExecutionContext, INestApplication } from '@nestjs/common';
import request from 'supertest';
import { CreditsController } from './credits.controller';
import { CreditLedgerService } from '../../services/credit/credit-ledger.service';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { HttpExceptionFilter } from '../../common/filters/http-exception.filter';
import {
  NoCreditsException,
  NotReceiverException,
} from '../../common/exceptions/market.exceptions';

describe('CreditsController (HTTP)', () => {
  let app: INestApplication;
  let creditLedgerService: any;

  const callerId = '65a1b2c3d4e5f6a7b8c9d0e1';
  const otherId = '65a1b2c3d4e5f6a7b8c9d0e2';

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [CreditsController],
      providers: [
        {
          provide: CreditLedgerService,
          useValue: {
            creditedBalance: jest.fn(),
            withdrawAllFailedCredits: jest.fn(),
          },
        },
      ],
    })
      .overrideGuard(JwtAuthGuard)
      .useValue({
        canActivate: (context: ExecutionContext) => {
          context.switchToHttp().getRequest().user = { _id: callerId };
          return true;
        },
      })
      .compile();

    app = module.createNestApplication();
    app.useGlobalFilters(new HttpExceptionFilter());
    await app.init();

    creditLedgerService = module.get(CreditLedgerService);
  });

  afterEach(async () => {
    await app.close();
    jest.clearAllMocks();
  });

  describe('GET /credits/:account', () => {
    it('should return the credited balance', async () => {
      creditLedgerService.creditedBalance.mockResolvedValue(150);

      const response = await request(app.getHttpServer()).get(`/credits/${otherId}`).expect(200);

      expect(response.body).toEqual({ account: otherId, amount: 150 });
      expect(creditLedgerService.creditedBalance).toHaveBeenCalledWith(otherId);
    });

    it('should reject an invalid account id', async () => {
      const response = await request(app.getHttpServer()).get('/credits/abc').expect(400);

      expect(response.body).toMatchObject({
        statusCode: 400,
        code: 'BAD_REQUEST',
        message: 'Invalid id: abc',
        path: '/credits/abc',
      });
      expect(creditLedgerService.creditedBalance).not.toHaveBeenCalled();
    });
  });

  describe('POST /credits/:receiver/withdraw', () => {
    it('should withdraw for the authenticated caller', async () => {
      creditLedgerService.withdrawAllFailedCredits.mockResolvedValue({
        account: callerId,
        amount: 150,
      });

      const response = await request(app.getHttpServer())
        .post(`/credits/${callerId}/withdraw`)
        .expect(200);

      expect(response.body).toEqual({ account: callerId, amount: 150 });
      expect(creditLedgerService.withdrawAllFailedCredits).toHaveBeenCalledWith(
        callerId,
        callerId,
      );
    });

    it('should answer 403 NOT_RECEIVER for credits of another account', async () => {
      creditLedgerService.withdrawAllFailedCredits.mockRejectedValue(
        new NotReceiverException(callerId, otherId),
      );

      const response = await request(app.getHttpServer())
        .post(`/credits/${otherId}/withdraw`)
        .expect(403);

      expect(response.body).toMatchObject({
        statusCode: 403,
        code: 'NOT_RECEIVER',
        message: `Account ${callerId} cannot withdraw credits of ${otherId}`,
      });
      expect(creditLedgerService.withdrawAllFailedCredits).toHaveBeenCalledWith(
        callerId,
        otherId,
      );
    });

    it('should pass a non-id receiver to the service instead of rejecting it as malformed', async () => {
      creditLedgerService.withdrawAllFailedCredits.mockRejectedValue(
        new NotReceiverException(callerId, 'abc'),
      );

      const response = await request(app.getHttpServer())
        .post('/credits/abc/withdraw')
        .expect(403);

      expect(response.body.code).toBe('NOT_RECEIVER');
    });

    it('should answer 409 NO_CREDITS when nothing is owed', async () => {
      creditLedgerService.withdrawAllFailedCredits.mockRejectedValue(
        new NoCreditsException(callerId),
      );

      const response = await request(app.getHttpServer())
        .post(`/credits/${callerId}/withdraw`)
        .expect(409);

      expect(response.body.code).toBe('NO_CREDITS');
    });
  });
});
