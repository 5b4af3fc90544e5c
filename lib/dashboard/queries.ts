/**
 * Dashboard Query Definitions
 *
 * Each entry becomes one top-level key of dashboard-data.json.
 * All queries read the cleaned online retail table in the Athena database.
 */

export interface QueryDefinition {
  name: string;
  description: string;
  sql: string;
}

export const DASHBOARD_QUERIES: readonly QueryDefinition[] = [
  {
    name: 'kpis',
    description: 'Global KPIs',
    sql: `
      SELECT
        COUNT(DISTINCT invoiceno) AS total_orders,
        COUNT(DISTINCT customerid) AS unique_customers,
        SUM(total_price) AS total_revenue,
        AVG(total_price) AS avg_order_value
      FROM online_retail_cleaned
    `,
  },
  {
    name: 'monthly_sales',
    description: 'Revenue and orders per calendar month',
    sql: `
      SELECT
        date_trunc('month', invoicedate) AS sales_month,
        SUM(total_price) AS monthly_revenue,
        COUNT(DISTINCT invoiceno) AS monthly_orders
      FROM online_retail_cleaned
      GROUP BY 1
      ORDER BY 1
    `,
  },
  {
    name: 'monthly_revenue',
    description: 'Revenue per YYYY-MM',
    sql: `
      SELECT
        DATE_FORMAT(invoicedate, '%Y-%m') AS month,
        SUM(total_price) AS revenue
      FROM online_retail_cleaned
      GROUP BY DATE_FORMAT(invoicedate, '%Y-%m')
      ORDER BY month
    `,
  },
  {
    name: 'monthly_revenue_by_country',
    description: 'Revenue per country and YYYY-MM',
    sql: `
      SELECT
        country,
        DATE_FORMAT(invoicedate, '%Y-%m') AS month,
        SUM(total_price) AS revenue
      FROM online_retail_cleaned
      GROUP BY country, DATE_FORMAT(invoicedate, '%Y-%m')
      ORDER BY country, month
    `,
  },
  {
    name: 'country_revenue',
    description: 'Revenue, orders, customers and AOV per country',
    sql: `
      SELECT
        country,
        SUM(total_price) AS revenue,
        COUNT(DISTINCT invoiceno) AS orders,
        COUNT(DISTINCT customerid) AS customers,
        CASE
          WHEN COUNT(DISTINCT invoiceno) = 0 THEN 0
          ELSE SUM(total_price) / COUNT(DISTINCT invoiceno)
        END AS avg_order_value
      FROM online_retail_cleaned
      GROUP BY country
      HAVING SUM(total_price) > 0
      ORDER BY revenue DESC
    `,
  },
  {
    name: 'top_products',
    description: 'Quantity and revenue per product per country',
    sql: `
      SELECT
        country,
        description,
        SUM(quantity) AS total_quantity_sold,
        SUM(total_price) AS revenue
      FROM online_retail_cleaned
      GROUP BY country, description
      ORDER BY revenue DESC
    `,
  },
  {
    name: 'rfm_analysis',
    description: 'Recency / frequency / monetary per repeat customer',
    sql: `
      SELECT
        country,
        customerid,
        CAST(date_diff('day', MAX(invoicedate), current_date) AS INTEGER) AS recency,
        COUNT(DISTINCT invoiceno) AS frequency,
        SUM(total_price) AS monetary
      FROM online_retail_cleaned
      GROUP BY country, customerid
      HAVING COUNT(DISTINCT invoiceno) > 1
    `,
  },
  {
    name: 'cohort_analysis',
    description: 'Active customers per first-order cohort and month offset',
    sql: `
      WITH first_order AS (
        SELECT
          customerid,
          country,
          date_trunc('month', MIN(invoicedate)) AS cohort_month
        FROM online_retail_cleaned
        GROUP BY customerid, country
      ),
      orders AS (
        SELECT
          customerid,
          country,
          date_trunc('month', invoicedate) AS order_month
        FROM online_retail_cleaned
        GROUP BY customerid, country, date_trunc('month', invoicedate)
      ),
      joined AS (
        SELECT
          o.customerid,
          o.country,
          f.cohort_month,
          o.order_month,
          date_diff('month', f.cohort_month, o.order_month) AS month_offset
        FROM orders o
        JOIN first_order f
          ON o.customerid = f.customerid
         AND o.country = f.country
      )
      SELECT
        country,
        cohort_month,
        CAST(month_offset AS INTEGER) AS month_index,
        COUNT(DISTINCT customerid) AS active_customers
      FROM joined
      GROUP BY country, cohort_month, month_index
      ORDER BY country, cohort_month, month_index
    `,
  },
  {
    name: 'market_basket',
    description: 'Top 15 product pairs bought on the same invoice',
    sql: `
      SELECT
        t1.description AS product_a,
        t2.description AS product_b,
        COUNT(*) AS times_purchased_together
      FROM online_retail_cleaned t1
      JOIN online_retail_cleaned t2
        ON t1.invoiceno = t2.invoiceno
      WHERE t1.stockcode < t2.stockcode
        AND t1.description NOT LIKE '%POSTAGE%'
        AND t2.description NOT LIKE '%POSTAGE%'
      GROUP BY 1, 2
      ORDER BY 3 DESC
      LIMIT 15
    `,
  },
];
