import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { PurchaseOrderModule } from './contexts/purchase-order';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
    }),
    PurchaseOrderModule,
  ],
})
export class AppModule {}
