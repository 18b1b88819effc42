import { z } from "zod";
import type { ToolDefinition } from "./registry.js";
import type { RestaurantDb } from "../data/restaurant-db.js";
import {
  OUTPUT_FORMAT_PARAM,
  capped,
  optNumber,
  optText,
  outputFormat,
  parseToolArgs,
  render,
} from "./args.js";

// ── Staff Tools (internal only) ──────────────────────────

const employeeArgs = z.object({
  name_filter: optText,
  position_filter: optText,
  department_filter: optText,
  shift_filter: optText,
  status_filter: optText,
  min_performance: optNumber,
  limit: optNumber,
  output_format: outputFormat,
});

const statsArgs = z.object({
  department: optText,
  output_format: outputFormat,
});

export function createEmployeeTools(db: RestaurantDb): ToolDefinition[] {
  const queryEmployees: ToolDefinition = {
    name: "query_employees",
    description:
      "Look up staff members by name, position, department, shift, status or minimum performance rating.",
    parameters: {
      type: "object",
      properties: {
        name_filter: {
          type: "string",
          description: "First or last name (partial match).",
        },
        position_filter: { type: "string", description: "Job position." },
        department_filter: {
          type: "string",
          description: "Department (Kitchen, Service, Management, Bar, Cleaning).",
        },
        shift_filter: {
          type: "string",
          enum: ["morning", "afternoon", "evening", "night"],
          description: "Shift type.",
        },
        status_filter: {
          type: "string",
          enum: ["active", "inactive", "on_leave"],
          description: "Employment status.",
        },
        min_performance: {
          type: "number",
          description: "Minimum performance rating (1.0-5.0).",
        },
        limit: { type: "number", description: "Maximum rows to return." },
        output_format: OUTPUT_FORMAT_PARAM,
      },
      required: [],
    },
    personas: ["internal"],

    executeSync: (input) => {
      const args = parseToolArgs("query_employees", employeeArgs, input);
      const employees = capped(
        db.queryEmployees({
          name: args.name_filter,
          position: args.position_filter,
          department: args.department_filter,
          shift: args.shift_filter,
          status: args.status_filter,
          minPerformance: args.min_performance,
        }),
        args.limit,
      );

      return render(args.output_format, { count: employees.length, employees }, () => {
        if (employees.length === 0) return "No employees found matching the criteria.";
        return [
          `Found ${employees.length} employee(s):`,
          ...employees.map(
            (e) =>
              `- ${e.first_name} ${e.last_name} (${e.employee_id}): ${e.position}, ${e.department}, ` +
              `${e.shift_type} shift, rating ${e.performance_rating.toFixed(1)}, ${e.status}`,
          ),
        ].join("\n");
      });
    },
  };

  const performanceStats: ToolDefinition = {
    name: "get_employee_performance_stats",
    description:
      "Aggregate staff performance: averages, high and low performers, per-department breakdown.",
    parameters: {
      type: "object",
      properties: {
        department: {
          type: "string",
          description: "Restrict the statistics to one department.",
        },
        output_format: OUTPUT_FORMAT_PARAM,
      },
      required: [],
    },
    personas: ["internal"],

    executeSync: (input) => {
      const args = parseToolArgs("get_employee_performance_stats", statsArgs, input);
      const stats = db.employeeStats(args.department);
      if (!stats) {
        return render(args.output_format, { stats: null }, () => "No employees found.");
      }

      return render(args.output_format, { stats }, () =>
        [
          `Employees: ${stats.total}`,
          `Average performance: ${stats.averagePerformance.toFixed(2)}`,
          `Average tenure: ${stats.averageTenureMonths.toFixed(1)} months`,
          `High performers (4.0+): ${stats.highPerformers}`,
          `Needs improvement (<3.0): ${stats.lowPerformers}`,
          "By department:",
          ...stats.departments.map(
            (d) => `- ${d.department}: ${d.count} staff, avg ${d.averageRating.toFixed(2)}`,
          ),
        ].join("\n"),
      );
    },
  };

  return [queryEmployees, performanceStats];
}
