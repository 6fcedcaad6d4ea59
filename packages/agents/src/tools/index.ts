export {
    searchExercises,
    loadExerciseCatalog,
    toWorkoutExercise,
    CatalogExerciseSchema,
    DEFAULT_SEARCH_LIMIT,
} from './exercise-catalog.js';
export type { CatalogExercise, ExerciseSearchCriteria } from './exercise-catalog.js';
export {
    getCalendarAvailability,
    loadSchedules,
    scheduleIndex,
    SchedulesSchema,
    TimeSlotSchema,
    DEFAULT_WORKOUT_MINUTES,
} from './calendar.js';
export type {
    AvailabilityQuery,
    CalendarAvailability,
    CalendarOptions,
    Schedules,
    TimeSlot,
} from './calendar.js';
export {
    checkEquipmentForWorkout,
    getEquipmentInventory,
    loadLocationData,
    normalizeEquipment,
    resolveLocation,
    LocationDataSchema,
} from './equipment.js';
export type { EquipmentCheck, EquipmentInventory, LocationData } from './equipment.js';
