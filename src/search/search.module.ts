import { Module } from '@nestjs/common';
import { ChatModule } from '../chat/chat.module';
import { SearchService } from './search.service';
import { SearchController } from './search.controller';

@Module({
  imports: [ChatModule],
  providers: [SearchService],
  controllers: [SearchController],
})
export class SearchModule {}
