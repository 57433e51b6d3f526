// Decorated classes are constructed directly in tests, outside the container.
import "reflect-metadata";
