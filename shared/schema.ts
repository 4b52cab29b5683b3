import { z } from "zod";

// ============================================
// DOMAIN VALUES
// ============================================

export const YES = "Да";
export const UNKNOWN = "Неизвестно";
export const NOT_PROCESSED = "Не обработан";
export const ADDED_BY_PARSER = "Парсер";

export const VILLAGE_STATUS = {
  built: "Построен и заселен",
  underConstruction: "В строительстве (>80%)",
} as const;

export const SECURITY_TYPE = {
  privateCompany: "ЧОП",
  inHouse: "Собственная охрана",
} as const;

export const LEAD_SCORE = {
  target: "Целевой",
  needsReview: "Требует проверки",
  nonTarget: "Нецелевой",
} as const;

export type LeadScore = (typeof LEAD_SCORE)[keyof typeof LEAD_SCORE];

// ============================================
// VILLAGE RECORD
// ============================================

const text = z.string().nullable();
const count = z.number().int().nullable();

export const villageSchema = z.object({
  id: z.number().int().positive().nullable(),

  // Block 1: location
  name: z.string(),
  region: text,
  district: text,
  address: text,
  coordinates: text,
  source_url: text,

  // Block 2: infrastructure
  house_count: count,
  status: text,
  has_fence: text,
  has_checkpoint: text,
  checkpoint_count: count,
  has_security: text,
  security_type: text,
  has_internet: text,

  // Block 3: contacts
  management_type: text,
  management_name: text,
  management_contact_person: text,
  phone_primary: text,
  phone_secondary: text,
  email: text,
  website: text,
  social_links: text,

  // Block 4: qualification
  challenges: text,
  authority: text,
  budget: text,
  priority: text,
  lead_score: text,

  // Block 5-6: CRM placeholders, filled by hand downstream
  crm_status: text,
  crm_deal_id: text,
  manager: text,
  first_contact_date: text,
  last_contact_date: text,
  next_contact_date: text,
  comments: text,
  outcome: text,
  sale_date: text,
  deal_amount: text,
  refusal_reason: text,

  // Block 7: provenance
  source_name: text,
  date_added: text,
  date_updated: text,
  added_by: text,
});

export type Village = z.infer<typeof villageSchema>;
export type VillageField = keyof Village;

/**
 * CSV header of the persisted dataset. Key order is the column order.
 */
export const villageColumns = {
  id: "ID",
  name: "Название поселка",
  region: "Регион",
  district: "Город/Район",
  address: "Адрес",
  coordinates: "Координаты",
  source_url: "Ссылка на источник",
  house_count: "Количество домов/участков",
  status: "Статус поселка",
  has_fence: "Наличие ограждения",
  has_checkpoint: "Наличие КПП",
  checkpoint_count: "Количество КПП",
  has_security: "Наличие охраны",
  security_type: "Тип охраны",
  has_internet: "Наличие интернета",
  management_type: "Тип управления",
  management_name: "Название УК/ТСЖ",
  management_contact_person: "ФИО председателя/руководителя",
  phone_primary: "Телефон основной",
  phone_secondary: "Телефон дополнительный",
  email: "Email",
  website: "Сайт поселка/УК",
  social_links: "Социальные сети",
  challenges: "Challenges (Проблемы)",
  authority: "Authority (Полномочия)",
  budget: "Money (Бюджет)",
  priority: "Priority (Приоритет)",
  lead_score: "Оценка целевого клиента",
  crm_status: "Статус в CRM",
  crm_deal_id: "ID сделки в CRM",
  manager: "Менеджер",
  first_contact_date: "Дата первого контакта",
  last_contact_date: "Дата последнего контакта",
  next_contact_date: "Следующий контакт",
  comments: "Комментарии",
  outcome: "Результат",
  sale_date: "Дата продажи",
  deal_amount: "Сумма сделки",
  refusal_reason: "Причина отказа",
  source_name: "Источник информации",
  date_added: "Дата добавления в базу",
  date_updated: "Дата последнего обновления",
  added_by: "Кто добавил",
} as const satisfies Record<VillageField, string>;

export const VILLAGE_FIELDS = Object.keys(villageColumns).filter(
  (key): key is VillageField => key in villageSchema.shape
);

// ============================================
// CSV ROW <-> RECORD
// ============================================

const csvText = z
  .string()
  .optional()
  .transform(v => {
    const trimmed = (v ?? "").trim();
    return trimmed.length > 0 ? trimmed : null;
  });

const csvInt = csvText.transform(v => {
  if (v === null) return null;
  const n = Number.parseInt(v, 10);
  return Number.isFinite(n) ? n : null;
});

const csvId = csvInt.transform(v => (v !== null && v > 0 ? v : null));

/**
 * One row of the persisted CSV keyed by its Russian headers.
 * Unknown columns are ignored; missing ones read as empty.
 */
export const villageCsvRowSchema = z
  .object({
    [villageColumns.id]: csvId,
    [villageColumns.name]: csvText,
    [villageColumns.region]: csvText,
    [villageColumns.district]: csvText,
    [villageColumns.address]: csvText,
    [villageColumns.coordinates]: csvText,
    [villageColumns.source_url]: csvText,
    [villageColumns.house_count]: csvInt,
    [villageColumns.status]: csvText,
    [villageColumns.has_fence]: csvText,
    [villageColumns.has_checkpoint]: csvText,
    [villageColumns.checkpoint_count]: csvInt,
    [villageColumns.has_security]: csvText,
    [villageColumns.security_type]: csvText,
    [villageColumns.has_internet]: csvText,
    [villageColumns.management_type]: csvText,
    [villageColumns.management_name]: csvText,
    [villageColumns.management_contact_person]: csvText,
    [villageColumns.phone_primary]: csvText,
    [villageColumns.phone_secondary]: csvText,
    [villageColumns.email]: csvText,
    [villageColumns.website]: csvText,
    [villageColumns.social_links]: csvText,
    [villageColumns.challenges]: csvText,
    [villageColumns.authority]: csvText,
    [villageColumns.budget]: csvText,
    [villageColumns.priority]: csvText,
    [villageColumns.lead_score]: csvText,
    [villageColumns.crm_status]: csvText,
    [villageColumns.crm_deal_id]: csvText,
    [villageColumns.manager]: csvText,
    [villageColumns.first_contact_date]: csvText,
    [villageColumns.last_contact_date]: csvText,
    [villageColumns.next_contact_date]: csvText,
    [villageColumns.comments]: csvText,
    [villageColumns.outcome]: csvText,
    [villageColumns.sale_date]: csvText,
    [villageColumns.deal_amount]: csvText,
    [villageColumns.refusal_reason]: csvText,
    [villageColumns.source_name]: csvText,
    [villageColumns.date_added]: csvText,
    [villageColumns.date_updated]: csvText,
    [villageColumns.added_by]: csvText,
  })
  .transform((row): Village => ({
    id: row[villageColumns.id],
    name: row[villageColumns.name] ?? "",
    region: row[villageColumns.region],
    district: row[villageColumns.district],
    address: row[villageColumns.address],
    coordinates: row[villageColumns.coordinates],
    source_url: row[villageColumns.source_url],
    house_count: row[villageColumns.house_count],
    status: row[villageColumns.status],
    has_fence: row[villageColumns.has_fence],
    has_checkpoint: row[villageColumns.has_checkpoint],
    checkpoint_count: row[villageColumns.checkpoint_count],
    has_security: row[villageColumns.has_security],
    security_type: row[villageColumns.security_type],
    has_internet: row[villageColumns.has_internet],
    management_type: row[villageColumns.management_type],
    management_name: row[villageColumns.management_name],
    management_contact_person: row[villageColumns.management_contact_person],
    phone_primary: row[villageColumns.phone_primary],
    phone_secondary: row[villageColumns.phone_secondary],
    email: row[villageColumns.email],
    website: row[villageColumns.website],
    social_links: row[villageColumns.social_links],
    challenges: row[villageColumns.challenges],
    authority: row[villageColumns.authority],
    budget: row[villageColumns.budget],
    priority: row[villageColumns.priority],
    lead_score: row[villageColumns.lead_score],
    crm_status: row[villageColumns.crm_status],
    crm_deal_id: row[villageColumns.crm_deal_id],
    manager: row[villageColumns.manager],
    first_contact_date: row[villageColumns.first_contact_date],
    last_contact_date: row[villageColumns.last_contact_date],
    next_contact_date: row[villageColumns.next_contact_date],
    comments: row[villageColumns.comments],
    outcome: row[villageColumns.outcome],
    sale_date: row[villageColumns.sale_date],
    deal_amount: row[villageColumns.deal_amount],
    refusal_reason: row[villageColumns.refusal_reason],
    source_name: row[villageColumns.source_name],
    date_added: row[villageColumns.date_added],
    date_updated: row[villageColumns.date_updated],
    added_by: row[villageColumns.added_by],
  }));

export type VillageCsvRow = Record<string, string>;

export function villageToCsvRow(village: Village): VillageCsvRow {
  const row: VillageCsvRow = {};
  for (const field of VILLAGE_FIELDS) {
    const value = village[field];
    row[villageColumns[field]] = value === null ? "" : String(value);
  }
  return row;
}

// ============================================
// FACTORY
// ============================================

export interface NewVillageOptions {
  sourceName: string;
  runDate: string;
  id?: number | null;
  region?: string | null;
}

/**
 * Empty record with the qualification/CRM placeholders and provenance stamped.
 */
export function createEmptyVillage(options: NewVillageOptions): Village {
  return {
    id: options.id ?? null,
    name: "",
    region: options.region ?? null,
    district: null,
    address: null,
    coordinates: null,
    source_url: null,
    house_count: null,
    status: null,
    has_fence: null,
    has_checkpoint: null,
    checkpoint_count: null,
    has_security: null,
    security_type: null,
    has_internet: null,
    management_type: null,
    management_name: null,
    management_contact_person: null,
    phone_primary: null,
    phone_secondary: null,
    email: null,
    website: null,
    social_links: null,
    challenges: UNKNOWN,
    authority: UNKNOWN,
    budget: UNKNOWN,
    priority: UNKNOWN,
    lead_score: LEAD_SCORE.needsReview,
    crm_status: NOT_PROCESSED,
    crm_deal_id: null,
    manager: null,
    first_contact_date: null,
    last_contact_date: null,
    next_contact_date: null,
    comments: null,
    outcome: NOT_PROCESSED,
    sale_date: null,
    deal_amount: null,
    refusal_reason: null,
    source_name: options.sourceName,
    date_added: options.runDate,
    date_updated: options.runDate,
    added_by: ADDED_BY_PARSER,
  };
}

export function isEmptyValue(value: unknown): boolean {
  return value === null || value === undefined || value === "";
}
