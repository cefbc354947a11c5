import { Module } from '@nestjs/common';
import { CategoryModule } from '../category/category.module';
import { SearchModule } from '../search/search.module';
import { CategoryController } from './controllers/category.controller';
import { DocumentController } from './controllers/document.controller';
import { SearchController } from './controllers/search.controller';

@Module({
  imports: [SearchModule, CategoryModule],
  controllers: [SearchController, CategoryController, DocumentController],
})
export class ApiModule {}
