import { Module } from '@nestjs/common';
import { CourseAvailabilityModule } from './course-availability/course-availability.module';

@Module({
  imports: [CourseAvailabilityModule],
})
export class AppModule {}
