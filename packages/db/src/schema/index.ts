export { catalog, type CatalogRow, type NewCatalogRow } from "./catalog.js";
