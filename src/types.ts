/**
 * Core types for the genai-kit library
 *
 * Re-exports all types from domain-specific files in types/.
 */

export * from './types/index'
