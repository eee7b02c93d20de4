import { PASSING_GRADE_POINT } from '../config/placement';
import mongoRepository from '../repositories/mongo.repository';
import { AcademicService } from './academic.service';
import { ApplicationService } from './application.service';
import { AuthService } from './auth.service';
import { CompanyService } from './company.service';
import { EmailService } from './email.service';
import { ExportService } from './export.service';
import { PdfResultReader } from './pdfTable.service';
import { StudentService } from './student.service';

export const emailService = new EmailService(mongoRepository);
export const authService = new AuthService(mongoRepository, emailService);
export const studentService = new StudentService(mongoRepository);
export const companyService = new CompanyService(mongoRepository);
export const applicationService = new ApplicationService(mongoRepository, emailService);
export const academicService = new AcademicService(mongoRepository, new PdfResultReader(), {
  passingGradePoint: PASSING_GRADE_POINT,
});
export const exportService = new ExportService(mongoRepository);
