import { Controller } from '@nestjs/common';
import { MessagePattern, Payload } from '@nestjs/microservices';

import { ExtractorSubjects } from '../../config/services';
import { ExtractionsService } from './extractions.service';
import { ExtractInvoiceDto } from './dto';

@Controller()
export class ExtractionsController {
  constructor(private readonly extractionsService: ExtractionsService) {}

  @MessagePattern(ExtractorSubjects.extract)
  extract(@Payload() payload: ExtractInvoiceDto) {
    return this.extractionsService.extract(payload);
  }

  @MessagePattern(ExtractorSubjects.health)
  health() {
    return this.extractionsService.health();
  }
}
