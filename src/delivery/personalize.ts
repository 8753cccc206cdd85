import type { SqliteDb } from "../db/db";
import type { ContentPlanEntry } from "../db/contentPlanRepo";
import { countDirectReferrals, getReferralInfo, getReferrer, getUser, type ReferralInfo, type UserRow } from "../db/usersRepo";

export type TemplateVars = Readonly<Record<string, string>>;

export type RenderedMessage = {
  text: string;
  mediaRefs: string[];
};

export type RenderContext = {
  owner: UserRow | null;
  ownerInfo: ReferralInfo | null;
  recipientReferralCount: number;
};

const PLACEHOLDER_PATTERN = /\{([a-z_]+(?::[A-Za-z0-9_.-]+)?)\}/g;

/** Replaces `{name}` placeholders that have a value in `vars`; everything else stays verbatim. */
export function renderTemplate(template: string, vars: TemplateVars): string {
  return template.replace(PLACEHOLDER_PATTERN, (match: string, key: string) =>
    Object.prototype.hasOwnProperty.call(vars, key) ? vars[key] : match
  );
}

export function displayName(user: Pick<UserRow, "name" | "username" | "telegram_id">): string {
  const name = user.name?.trim();
  if (name) return name;
  const username = user.username?.trim();
  if (username) return `@${username.replace(/^@/, "")}`;
  return user.telegram_id;
}

export function buildTemplateVars(recipient: UserRow, context: RenderContext): TemplateVars {
  const vars: Record<string, string> = {
    recipient_name: displayName(recipient),
    recipient_username: recipient.username ?? "",
    referral_count: String(context.recipientReferralCount)
  };

  if (context.owner) {
    vars.owner_name = context.ownerInfo?.real_name ?? displayName(context.owner);
    vars.owner_link = context.ownerInfo?.link ?? context.owner.user_url ?? "";
  }

  for (const [key, value] of Object.entries(recipient.custom_fields)) {
    vars[`field:${key}`] = value;
  }

  return vars;
}

/** Pure: the same entry, recipient and context always render to the same message. */
export function render(entry: ContentPlanEntry, recipient: UserRow, context: RenderContext): RenderedMessage {
  return {
    text: renderTemplate(entry.message_text, buildTemplateVars(recipient, context)),
    mediaRefs: [...entry.media_refs]
  };
}

export type Personalizer = {
  render: (entry: ContentPlanEntry, recipient: UserRow) => RenderedMessage;
  renderWelcome: (template: string, recipient: UserRow) => string;
};

/**
 * Reads the render context from the stores. A deleted owner renders without owner placeholders
 * rather than failing; those stay verbatim in the text.
 */
export function createPersonalizer(db: SqliteDb): Personalizer {
  function loadOwner(ownerId: number): Pick<RenderContext, "owner" | "ownerInfo"> {
    const row = db.prepare<[number], { user_id: number }>("SELECT user_id FROM users WHERE user_id = ?").get(ownerId);
    if (!row) return { owner: null, ownerInfo: null };
    return { owner: getUser(db, ownerId), ownerInfo: getReferralInfo(db, ownerId) };
  }

  return {
    render(entry, recipient) {
      return render(entry, recipient, {
        ...loadOwner(entry.owner_id),
        recipientReferralCount: countDirectReferrals(db, recipient.user_id)
      });
    },

    renderWelcome(template, recipient) {
      const referrer = getReferrer(db, recipient.user_id);
      const vars = buildTemplateVars(recipient, {
        owner: referrer,
        ownerInfo: referrer ? getReferralInfo(db, referrer.user_id) : null,
        recipientReferralCount: countDirectReferrals(db, recipient.user_id)
      });
      return renderTemplate(template, vars);
    }
  };
}
