import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { Asset, AssetSchema } from '../../models/asset.schema';
import { AssetCustodyService } from './asset-custody.service';

@Module({
  imports: [MongooseModule.forFeature([{ name: Asset.name, schema: AssetSchema }])],
  providers: [AssetCustodyService],
  exports: [AssetCustodyService],
})
export class CustodyModule {}
