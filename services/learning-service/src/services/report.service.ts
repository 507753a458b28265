import type { AnalyticsService } from './analytics.service';

export type ReportRow = Record<string, string | number | null>;

export interface ReportSink {
  heading(title: string): void;
  table(rows: ReportRow[]): void;
}

export const consoleSink: ReportSink = {
  heading(title) {
    console.log(`\n=== ${title} ===`);
  },
  table(rows) {
    if (rows.length === 0) {
      console.log('(no data)');
      return;
    }
    console.table(rows);
  },
};

const round = (value: number | null, places = 2): number | null =>
  value === null ? null : Math.round(value * 10 ** places) / 10 ** places;

/**
 * Renders the analytics reports as tables.
 */
export class ReportService {
  constructor(private readonly analytics: AnalyticsService) {}

  async printReport(sink: ReportSink = consoleSink): Promise<void> {
    const courseStats = await this.analytics.getCourseEnrollmentStatistics();
    const performance = await this.analytics.getStudentPerformanceAnalysis();
    const instructors = await this.analytics.getInstructorAnalytics();
    const advanced = await this.analytics.getAdvancedAnalytics();

    sink.heading('Course enrollment by category');
    sink.table(
      courseStats.map((row) => ({
        category: row.category,
        courses: row.totalCourses,
        enrollments: row.totalEnrollments,
        avgPrice: round(row.avgPrice),
      }))
    );

    sink.heading('Student performance');
    sink.table(
      performance.map((row) => ({
        student: row.studentName,
        averageGrade: round(row.averageGrade),
        submissions: row.totalSubmissions,
        courses: row.coursesCount,
      }))
    );

    sink.heading('Instructor revenue');
    sink.table(
      instructors.map((row) => ({
        instructor: row.instructorName,
        courses: row.totalCourses,
        students: row.totalStudents,
        revenue: row.totalRevenue,
      }))
    );

    sink.heading('Monthly enrollment trend');
    sink.table(
      advanced.monthlyTrends.map((row) => ({
        period: row.year === null || row.month === null ? null : `${row.year}-${String(row.month).padStart(2, '0')}`,
        enrollments: row.enrollments,
        active: row.active,
        completed: row.completed,
      }))
    );

    sink.heading('Popular categories');
    sink.table(
      advanced.popularCategories.map((row) => ({
        category: row.category,
        enrollments: row.totalEnrollments,
        courses: row.courseCount,
      }))
    );

    sink.heading('Student engagement');
    sink.table(
      advanced.engagement.map((row) => ({
        status: row.status,
        count: row.count,
        avgProgress: round(row.avgProgress, 1),
      }))
    );
  }
}
