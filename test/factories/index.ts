/**
 * Test Factories Index
 *
 * Central export point for all test data factories.
 */

export * from './telemetry';
