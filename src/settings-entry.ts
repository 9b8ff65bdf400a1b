export {
  Settings,
  ImproperlyConfigured,
  resolveSettings,
  mergeDefaults,
  type EffectiveSettings,
  type SettingsData,
  type SettingsSchema,
} from "@/settings"
