export {
  createFixture,
  fixtureRequest,
  loadFixtureCatalog,
  type Fixture,
  type RequestOverrides,
} from "./fixtures.js";
