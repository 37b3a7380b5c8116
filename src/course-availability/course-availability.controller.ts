import { Body, Controller, HttpCode, Post } from '@nestjs/common';
import { CourseAvailabilityService } from './course-availability.service';
import { CheckAvailabilityDto } from './dto-check-availability.dto';

@Controller('api/course-availability')
export class CourseAvailabilityController {
  constructor(private readonly availabilityService: CourseAvailabilityService) {}

  @Post('check')
  @HttpCode(200)
  async check(@Body() dto: CheckAvailabilityDto) {
    return this.availabilityService.checkAvailabilityWithEnhancements(dto.skills);
  }
}
