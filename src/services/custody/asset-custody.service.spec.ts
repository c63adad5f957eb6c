import { Test, TestingModule } from '@nestjs/testing';
import { getModelToken, getConnectionToken } from '@nestjs/mongoose';
import { AssetCustodyService } from './asset-custody.service';
import { Asset } from '../../models/asset.schema';
import { MARKETPLACE_CUSTODY } from '../../common/constants';
import {
  AssetNotFoundException,
  NotOwnerException,
  TransferNotAuthorizedException,
} from '../../common/exceptions/market.exceptions';

describe('AssetCustodyService', () => {
  let service: AssetCustodyService;
  let assetModel: any;

  const session: any = { id: 'session' };

  const mockConnection = {
    startSession: jest.fn(() => ({
      endSession: jest.fn(),
      withTransaction: jest.fn((callback) => callback()),
    })),
  };

  const withAsset = (asset: unknown) =>
    assetModel.findOne.mockReturnValue({
      session: jest.fn(),
      exec: jest.fn().mockResolvedValue(asset),
    });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AssetCustodyService,
        {
          provide: getModelToken(Asset.name),
          useValue: {
            findOne: jest.fn(),
            findOneAndUpdate: jest.fn(),
            create: jest.fn(),
          },
        },
        {
          provide: getConnectionToken(),
          useValue: mockConnection,
        },
      ],
    }).compile();

    service = module.get<AssetCustodyService>(AssetCustodyService);
    assetModel = module.get(getModelToken(Asset.name));
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('mint', () => {
    const withLastAsset = (asset: unknown) =>
      assetModel.findOne.mockReturnValue({
        sort: jest.fn().mockReturnValue({
          session: jest.fn().mockReturnValue({
            exec: jest.fn().mockResolvedValue(asset),
          }),
        }),
      });

    it('should start token ids at zero', async () => {
      withLastAsset(null);
      assetModel.create.mockResolvedValue([{ tokenId: 0, owner: 'alice', approved: null }]);

      const asset = await service.mint('alice');

      expect(asset).toEqual({ tokenId: 0, owner: 'alice', approved: null });
      expect(assetModel.create).toHaveBeenCalledWith(
        [{ tokenId: 0, owner: 'alice', approved: null }],
        { session: expect.anything() },
      );
    });

    it('should continue after the highest token id', async () => {
      withLastAsset({ tokenId: 6 });
      assetModel.create.mockResolvedValue([{ tokenId: 7, owner: 'alice', approved: null }]);

      const asset = await service.mint('alice');

      expect(asset.tokenId).toBe(7);
      expect(assetModel.create).toHaveBeenCalledWith(
        [{ tokenId: 7, owner: 'alice', approved: null }],
        expect.anything(),
      );
    });
  });

  describe('approve', () => {
    it('should let the owner approve an operator', async () => {
      withAsset({ tokenId: 0, owner: 'alice', approved: null });
      assetModel.findOneAndUpdate.mockReturnValue({
        exec: jest.fn().mockResolvedValue({ tokenId: 0, owner: 'alice', approved: MARKETPLACE_CUSTODY }),
      });

      const asset = await service.approve(0, 'alice', MARKETPLACE_CUSTODY);

      expect(asset.approved).toBe(MARKETPLACE_CUSTODY);
    });

    it('should reject approval by someone other than the owner', async () => {
      withAsset({ tokenId: 0, owner: 'alice', approved: null });

      await expect(service.approve(0, 'bob', MARKETPLACE_CUSTODY)).rejects.toThrow(
        NotOwnerException,
      );
      expect(assetModel.findOneAndUpdate).not.toHaveBeenCalled();
    });
  });

  describe('ownerOf', () => {
    it('should throw AssetNotFoundException for an unknown token', async () => {
      withAsset(null);

      await expect(service.ownerOf(42)).rejects.toThrow(AssetNotFoundException);
    });
  });

  describe('transferCustody', () => {
    it('should move the asset and clear the approval', async () => {
      withAsset({ tokenId: 0, owner: 'alice', approved: MARKETPLACE_CUSTODY });
      assetModel.findOneAndUpdate.mockReturnValue({
        exec: jest.fn().mockResolvedValue({ tokenId: 0, owner: MARKETPLACE_CUSTODY, approved: null }),
      });

      const asset = await service.transferCustody(
        0,
        'alice',
        MARKETPLACE_CUSTODY,
        MARKETPLACE_CUSTODY,
        session,
      );

      expect(asset).toEqual({ tokenId: 0, owner: MARKETPLACE_CUSTODY, approved: null });
      expect(assetModel.findOneAndUpdate).toHaveBeenCalledWith(
        { tokenId: 0, owner: 'alice' },
        { $set: { owner: MARKETPLACE_CUSTODY, approved: null } },
        { new: true, session },
      );
    });

    it('should fail when from is not the current owner', async () => {
      withAsset({ tokenId: 0, owner: 'alice', approved: null });

      await expect(
        service.transferCustody(0, 'bob', 'carol', 'bob', session),
      ).rejects.toThrow(NotOwnerException);
    });

    it('should fail when the operator is not approved', async () => {
      withAsset({ tokenId: 0, owner: 'alice', approved: null });

      await expect(
        service.transferCustody(0, 'alice', MARKETPLACE_CUSTODY, MARKETPLACE_CUSTODY, session),
      ).rejects.toThrow(TransferNotAuthorizedException);
      expect(assetModel.findOneAndUpdate).not.toHaveBeenCalled();
    });
  });
});
