/**
 * Fitness domain types shared by the planner, validator and orchestrator.
 */

export type Difficulty = 'beginner' | 'intermediate' | 'advanced';

export type GoalType = 'hypertrophy' | 'strength' | 'endurance' | 'power';

export interface WorkoutConstraints {
    /** Minutes available */
    duration?: number;
    equipment?: string[];
    difficulty?: Difficulty;
    muscleGroups?: string[];
}

/**
 * Planner input, parsed from an inbound task message.
 */
export interface WorkoutRequest {
    goal: string;
    constraints: WorkoutConstraints;
    /** True for a refinement call following a validator conflict */
    isCompromise: boolean;
    /** Validator recommendation passed along with a refinement */
    context?: string;
}

export interface WorkoutExercise {
    id: string;
    name: string;
    muscleGroup: string;
    equipment: string[];
    sets: number;
    reps: string;
    restSeconds: number;
    notes?: string;
}

export interface Workout {
    name: string;
    estimatedDuration: number;
    exercises: WorkoutExercise[];
}

export type ConflictType = 'time' | 'equipment' | 'fatigue' | 'other';

export type ConflictSeverity = 'high' | 'medium' | 'low';

export interface Conflict {
    type: ConflictType;
    severity: ConflictSeverity;
    message: string;
    suggestion: string;
}

export interface ConflictAnalysis {
    hasConflicts: boolean;
    conflicts: Conflict[];
    recommendation: string;
}

/**
 * Validator input, parsed from an inbound task message.
 */
export interface ValidationRequest {
    workout?: Workout;
    /** YYYY-MM-DD; today when absent */
    date?: string;
    location?: string;
    /** Free-text request used when no structured workout is present */
    rawRequest: string;
}
