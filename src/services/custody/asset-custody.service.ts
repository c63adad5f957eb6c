import { Injectable, Logger } from '@nestjs/common';
import { InjectConnection, InjectModel } from '@nestjs/mongoose';
import { ClientSession, Connection, Model } from 'mongoose';
import { Asset, AssetDocument } from '../../models/asset.schema';
import {
  AssetNotFoundException,
  NotOwnerException,
  TransferNotAuthorizedException,
} from '../../common/exceptions/market.exceptions';
import { runInTransaction } from '../../common/utils/transaction';

export interface AssetView {
  tokenId: number;
  owner: string;
  approved: string | null;
}

// владение активами: mint, approve, ownerOf, transferCustody
// маркетплейс сам активы не выпускает, только держит на хранении
@Injectable()
export class AssetCustodyService {
  private readonly logger = new Logger(AssetCustodyService.name);

  constructor(
    @InjectConnection() private connection: Connection,
    @InjectModel(Asset.name) private assetModel: Model<Asset>,
  ) {}

  // новый актив, tokenId по порядку с нуля
  async mint(to: string): Promise<AssetView> {
    return runInTransaction(this.connection, async (session) => {
      const last = await this.assetModel
        .findOne({})
        .sort({ tokenId: -1 })
        .session(session)
        .exec();
      const tokenId = last ? last.tokenId + 1 : 0;

      const [asset] = await this.assetModel.create(
        [{ tokenId, owner: to, approved: null }],
        { session },
      );

      this.logger.log(`Minted asset ${tokenId} to ${to}`);
      return this.toView(asset);
    });
  }

  async approve(tokenId: number, caller: string, operator: string): Promise<AssetView> {
    return runInTransaction(this.connection, async (session) => {
      const asset = await this.findAsset(tokenId, session);
      if (asset.owner !== caller) {
        throw new NotOwnerException(tokenId, caller);
      }

      const updated = await this.assetModel
        .findOneAndUpdate(
          { tokenId, owner: caller },
          { $set: { approved: operator } },
          { new: true, session },
        )
        .exec();

      if (!updated) {
        throw new NotOwnerException(tokenId, caller);
      }

      this.logger.log(`Asset ${tokenId}: ${caller} approved operator ${operator}`);
      return this.toView(updated);
    });
  }

  async ownerOf(tokenId: number, session?: ClientSession): Promise<string> {
    const asset = await this.findAsset(tokenId, session);
    return asset.owner;
  }

  async getAsset(tokenId: number): Promise<AssetView> {
    return this.toView(await this.findAsset(tokenId));
  }

  /**
   * Move an asset from `from` to `to` on behalf of `operator`
   *
   * `operator` must be the owner itself or the approved operator.
   * Approval is cleared by the transfer.
   */
  async transferCustody(
    tokenId: number,
    from: string,
    to: string,
    operator: string,
    session: ClientSession,
  ): Promise<AssetView> {
    const asset = await this.findAsset(tokenId, session);

    if (asset.owner !== from) {
      throw new NotOwnerException(tokenId, from);
    }

    if (operator !== from && operator !== asset.approved) {
      throw new TransferNotAuthorizedException(tokenId, operator);
    }

    const updated = await this.assetModel
      .findOneAndUpdate(
        { tokenId, owner: from },
        { $set: { owner: to, approved: null } },
        { new: true, session },
      )
      .exec();

    if (!updated) {
      throw new NotOwnerException(tokenId, from);
    }

    this.logger.log(`Asset ${tokenId} moved ${from} -> ${to}`);
    return this.toView(updated);
  }

  private async findAsset(tokenId: number, session?: ClientSession): Promise<AssetDocument> {
    const query = this.assetModel.findOne({ tokenId });
    if (session) {
      query.session(session);
    }
    const asset = await query.exec();
    if (!asset) {
      throw new AssetNotFoundException(tokenId);
    }
    return asset;
  }

  private toView(asset: Asset): AssetView {
    return {
      tokenId: asset.tokenId,
      owner: asset.owner,
      approved: asset.approved ?? null,
    };
  }
}
