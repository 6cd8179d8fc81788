import pg from "pg";
import dotenv from "dotenv";

dotenv.config();

const MIGRATIONS = [
  {
    name: "001_create_users",
    up: `
      CREATE EXTENSION IF NOT EXISTS "uuid-ossp";

      CREATE TABLE IF NOT EXISTS users (
        id UUID PRIMARY KEY DEFAULT uuid_generate_v4(),
        username TEXT NOT NULL UNIQUE,
        full_name TEXT NOT NULL DEFAULT '',
        role TEXT NOT NULL CHECK (role IN ('admin','manager','supervisor','salesperson')),
        is_active BOOLEAN NOT NULL DEFAULT TRUE,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );

      CREATE INDEX IF NOT EXISTS idx_users_role_active ON users(role, is_active);
    `,
  },
  {
    name: "002_create_leads",
    up: `
      CREATE TABLE IF NOT EXISTS leads (
        id UUID PRIMARY KEY DEFAULT uuid_generate_v4(),

        first_name TEXT NOT NULL,
        last_name TEXT NOT NULL,
        email TEXT NOT NULL,
        phone_number TEXT,
        company_name TEXT,
        job_title TEXT,

        city TEXT,
        territory TEXT,

        industry TEXT,
        company_size TEXT CHECK (company_size IN ('1-10','11-50','51-200','201-500','501-1000','1000+')),
        annual_revenue TEXT CHECK (annual_revenue IN ('under_1m','1m_5m','5m_10m','10m_50m','50m_100m','over_100m')),
        budget_range TEXT CHECK (budget_range IN ('under_10k','10k_50k','50k_100k','100k_500k','500k_1m','over_1m')),
        timeline TEXT CHECK (timeline IN ('immediate','short_term','medium_term','long_term','no_timeline')),
        source TEXT CHECK (source IN ('website','social_media','referral','cold_calling','email_marketing','advertising','trade_show','webinar','content_marketing','seo','paid_search','partner','other')),

        status TEXT NOT NULL DEFAULT 'new' CHECK (status IN ('new','contacted','qualified','proposal_sent','negotiating','converted','lost','unqualified')),
        priority TEXT NOT NULL DEFAULT 'medium' CHECK (priority IN ('low','medium','high','hot')),
        assigned_to UUID REFERENCES users(id) ON DELETE SET NULL,

        score INTEGER NOT NULL DEFAULT 0 CHECK (score BETWEEN 0 AND 100),
        is_qualified BOOLEAN NOT NULL DEFAULT FALSE,
        is_active BOOLEAN NOT NULL DEFAULT TRUE,

        last_contact_date TIMESTAMPTZ,
        next_follow_up_date TIMESTAMPTZ,

        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );

      CREATE INDEX IF NOT EXISTS idx_leads_status_assigned ON leads(status, assigned_to);
      CREATE INDEX IF NOT EXISTS idx_leads_score ON leads(score, created_at DESC);
      CREATE INDEX IF NOT EXISTS idx_leads_priority ON leads(priority, created_at DESC);
      CREATE INDEX IF NOT EXISTS idx_leads_next_follow_up ON leads(next_follow_up_date);
    `,
  },
  {
    name: "003_create_lead_activities",
    up: `
      CREATE TABLE IF NOT EXISTS lead_activities (
        id UUID PRIMARY KEY DEFAULT uuid_generate_v4(),
        lead_id UUID NOT NULL REFERENCES leads(id) ON DELETE CASCADE,
        activity_type TEXT NOT NULL CHECK (activity_type IN ('call','email','meeting','demo','proposal','follow_up','research','note','status_change')),
        outcome TEXT NOT NULL DEFAULT '',
        title TEXT NOT NULL DEFAULT '',
        description TEXT NOT NULL DEFAULT '',
        performed_by UUID REFERENCES users(id) ON DELETE SET NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );

      CREATE INDEX IF NOT EXISTS idx_lead_activities_lead ON lead_activities(lead_id, created_at DESC);
      CREATE INDEX IF NOT EXISTS idx_lead_activities_type ON lead_activities(activity_type, created_at DESC);
    `,
  },
  {
    name: "004_create_scoring_configuration",
    up: `
      CREATE TABLE IF NOT EXISTS scoring_criteria (
        id UUID PRIMARY KEY DEFAULT uuid_generate_v4(),
        name TEXT NOT NULL UNIQUE,
        category TEXT NOT NULL CHECK (category IN ('demographic','firmographic','behavioral','engagement','source','temporal')),
        description TEXT NOT NULL DEFAULT '',
        weight NUMERIC(5,2) NOT NULL DEFAULT 1.00 CHECK (weight BETWEEN 0.1 AND 10.0),
        max_score INTEGER NOT NULL DEFAULT 100 CHECK (max_score BETWEEN 1 AND 100),
        is_active BOOLEAN NOT NULL DEFAULT TRUE,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );

      CREATE TABLE IF NOT EXISTS scoring_rules (
        id UUID PRIMARY KEY DEFAULT uuid_generate_v4(),
        criteria_id UUID NOT NULL REFERENCES scoring_criteria(id) ON DELETE CASCADE,
        field_name TEXT NOT NULL,
        operator TEXT NOT NULL CHECK (operator IN ('eq','gt','gte','lt','lte','contains','in','not_in','is_null','is_not_null','regex')),
        value TEXT NOT NULL,
        points INTEGER NOT NULL CHECK (points BETWEEN -100 AND 100),
        description TEXT NOT NULL DEFAULT '',
        is_active BOOLEAN NOT NULL DEFAULT TRUE,
        sort_order INTEGER NOT NULL DEFAULT 0,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );

      CREATE INDEX IF NOT EXISTS idx_scoring_rules_criteria ON scoring_rules(criteria_id, sort_order);

      CREATE TABLE IF NOT EXISTS lead_scoring_profiles (
        id UUID PRIMARY KEY DEFAULT uuid_generate_v4(),
        name TEXT NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        is_default BOOLEAN NOT NULL DEFAULT FALSE,
        is_active BOOLEAN NOT NULL DEFAULT TRUE,
        hot_lead_threshold INTEGER NOT NULL DEFAULT 75,
        auto_assign_threshold INTEGER NOT NULL DEFAULT 80,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );

      CREATE UNIQUE INDEX IF NOT EXISTS idx_profiles_single_default
        ON lead_scoring_profiles(is_default) WHERE is_default = TRUE;

      CREATE TABLE IF NOT EXISTS profile_criteria (
        id UUID PRIMARY KEY DEFAULT uuid_generate_v4(),
        profile_id UUID NOT NULL REFERENCES lead_scoring_profiles(id) ON DELETE CASCADE,
        criteria_id UUID NOT NULL REFERENCES scoring_criteria(id) ON DELETE CASCADE,
        weight_multiplier NUMERIC(5,2) NOT NULL DEFAULT 1.00,
        is_enabled BOOLEAN NOT NULL DEFAULT TRUE,
        UNIQUE (profile_id, criteria_id)
      );

      CREATE TABLE IF NOT EXISTS activity_scoring_rules (
        id UUID PRIMARY KEY DEFAULT uuid_generate_v4(),
        name TEXT NOT NULL UNIQUE,
        activity_type TEXT NOT NULL DEFAULT '',
        outcome TEXT NOT NULL DEFAULT '',
        points_per_activity INTEGER NOT NULL DEFAULT 5,
        max_points_per_day INTEGER NOT NULL DEFAULT 25,
        decay_days INTEGER NOT NULL DEFAULT 30,
        decay_rate NUMERIC(5,2) NOT NULL DEFAULT 0.10,
        is_active BOOLEAN NOT NULL DEFAULT TRUE,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
    `,
  },
  {
    name: "005_create_score_history_and_alerts",
    up: `
      CREATE TABLE IF NOT EXISTS lead_score_history (
        id UUID PRIMARY KEY DEFAULT uuid_generate_v4(),
        lead_id UUID NOT NULL REFERENCES leads(id) ON DELETE CASCADE,
        total_score INTEGER NOT NULL,
        demographic_score INTEGER NOT NULL DEFAULT 0,
        firmographic_score INTEGER NOT NULL DEFAULT 0,
        behavioral_score INTEGER NOT NULL DEFAULT 0,
        engagement_score INTEGER NOT NULL DEFAULT 0,
        source_score INTEGER NOT NULL DEFAULT 0,
        temporal_score INTEGER NOT NULL DEFAULT 0,
        profile_id UUID REFERENCES lead_scoring_profiles(id) ON DELETE SET NULL,
        details JSONB NOT NULL DEFAULT '{}',
        score_change INTEGER NOT NULL DEFAULT 0,
        change_reason TEXT NOT NULL DEFAULT '',
        triggered_by TEXT NOT NULL DEFAULT '',
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );

      CREATE INDEX IF NOT EXISTS idx_score_history_lead ON lead_score_history(lead_id, created_at DESC);
      CREATE INDEX IF NOT EXISTS idx_score_history_total ON lead_score_history(total_score);

      CREATE TABLE IF NOT EXISTS scoring_alerts (
        id UUID PRIMARY KEY DEFAULT uuid_generate_v4(),
        lead_id UUID NOT NULL REFERENCES leads(id) ON DELETE CASCADE,
        alert_type TEXT NOT NULL CHECK (alert_type IN ('hot_lead','score_increase','score_decrease','threshold_reached','assignment_needed')),
        priority TEXT NOT NULL DEFAULT 'medium' CHECK (priority IN ('low','medium','high','urgent')),
        title TEXT NOT NULL,
        message TEXT NOT NULL,
        threshold_value INTEGER,
        current_score INTEGER NOT NULL,
        assigned_to UUID REFERENCES users(id) ON DELETE CASCADE,
        notify_supervisors BOOLEAN NOT NULL DEFAULT FALSE,
        is_read BOOLEAN NOT NULL DEFAULT FALSE,
        is_acknowledged BOOLEAN NOT NULL DEFAULT FALSE,
        acknowledged_by UUID REFERENCES users(id) ON DELETE SET NULL,
        acknowledged_at TIMESTAMPTZ,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );

      CREATE INDEX IF NOT EXISTS idx_scoring_alerts_assignee ON scoring_alerts(assigned_to, is_read);
      CREATE INDEX IF NOT EXISTS idx_scoring_alerts_type ON scoring_alerts(alert_type, priority);
      CREATE INDEX IF NOT EXISTS idx_scoring_alerts_open ON scoring_alerts(lead_id, alert_type) WHERE is_acknowledged = FALSE;
    `,
  },
];

async function migrate() {
  const client = new pg.Client({ connectionString: process.env.DATABASE_URL });
  await client.connect();

  // Ensure migrations tracking table exists
  await client.query(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name TEXT PRIMARY KEY,
      executed_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  const { rows: executed } = await client.query<{ name: string }>(
    "SELECT name FROM _migrations"
  );
  const executedNames = new Set(executed.map((r) => r.name));

  for (const migration of MIGRATIONS) {
    if (executedNames.has(migration.name)) {
      console.log(`  ✓ ${migration.name} (already applied)`);
      continue;
    }

    console.log(`  → Running ${migration.name}...`);
    await client.query("BEGIN");
    try {
      await client.query(migration.up);
      await client.query("INSERT INTO _migrations (name) VALUES ($1)", [
        migration.name,
      ]);
      await client.query("COMMIT");
      console.log(`  ✓ ${migration.name} applied`);
    } catch (err) {
      await client.query("ROLLBACK");
      console.error(`  ✗ ${migration.name} failed:`, err);
      process.exit(1);
    }
  }

  await client.end();
  console.log("\n✅ All migrations applied successfully.");
}

migrate().catch((err) => {
  console.error("Migration failed:", err);
  process.exit(1);
});
