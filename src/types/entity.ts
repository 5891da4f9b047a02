import type { JsonObject } from './json.js';

/** Datová část entity */
export interface EntityData {
  idService: string | null;
  timestamp: string | null;
  service: JsonObject;      // Pole vytažená podle konfigurovaných cest
  rules: JsonObject;        // Pole odvozená pravidly
}

/** Drátový tvar entity (persistence, API) */
export interface EntityRecord {
  entity_names: string[];
  session_id: string;
  tidnid: string | null;
  data: {
    id_service: string | null;
    timestamp: string | null;
    service: JsonObject;
    rules: JsonObject;
  };
}
