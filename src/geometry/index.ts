/**
 * Geometry module - re-exports the vector and line kernels
 */

export * from "./vector.js";
export * from "./line.js";
