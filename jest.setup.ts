/**
 * Jest setup file.
 *
 * Inversify reads constructor metadata through the Reflect API, so the
 * polyfill has to load before any decorated class is imported by a test.
 */
import 'reflect-metadata';
