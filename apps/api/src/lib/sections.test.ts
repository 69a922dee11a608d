import test from "node:test";
import assert from "node:assert/strict";
import { normalizeSectionName, sectionNameKey, sectionSlug } from "./sections.js";

test("normalizeSectionName trims and collapses whitespace", () => {
  assert.equal(normalizeSectionName("  Late   Night  Movies "), "Late Night Movies");
});

test("sectionNameKey is case-insensitive", () => {
  assert.equal(sectionNameKey("Movies"), sectionNameKey("  movies "));
});

test("sectionSlug", () => {
  assert.equal(sectionSlug("Late Night Movies!"), "late-night-movies");
  assert.equal(sectionSlug("Café Crème"), "cafe-creme");
  assert.equal(sectionSlug("***"), "section");
  assert.equal(sectionSlug("a".repeat(80)).length, 64);
});
