export interface User {
  id: number;
  username: string;
  createdAt: string;
}

export interface LearningStatistics {
  learnSessions: number;
  quizzesTaken: number;
  /** Mean progress over learn sessions, one decimal */
  averageProgress: number;
  /** Mean score percentage over quizzes with questions, one decimal */
  averageQuizPercentage: number;
}

export interface UserProfile extends User {
  statistics: LearningStatistics;
}
