import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Showing } from './entities/showing.entity';
import { Seat } from './entities/seat.entity';
import { ShowingsController } from './showings.controller';
import { ScreensController } from './screens.controller';
import { CatalogService } from './catalog.service';

@Module({
  imports: [TypeOrmModule.forFeature([Showing, Seat])],
  controllers: [ShowingsController, ScreensController],
  providers: [CatalogService],
  exports: [CatalogService],
})
export class CatalogModule {}
