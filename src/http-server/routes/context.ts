/**
 * @file Route handler context shared across modules
 */
import type { Allocator } from "../../allocator";

export type RouteContext = {
  allocator: Allocator;
};
