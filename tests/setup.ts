/**
 * Jest setup file
 */

// Nothing here waits on a network; fail fast if a test hangs
jest.setTimeout(10000);
