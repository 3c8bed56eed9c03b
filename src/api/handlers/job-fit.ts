import { Request, Response } from 'express';
import { JobDescription } from '../../operations';
import { EngineID } from '../../engines/interfaces';
import { ApiDeps } from '../api.interfaces';
import { jobFitRequestSchema, roleMatchingRequestSchema } from '../request.schemas';
import { abortOnClose, asyncHandler, invokeWithDefault, sendOk } from '../shared';
import { fallbackJobFit } from '../static-fallbacks';

/**
 * Roles ranked by /job-fit/role-matching when the request names none
 */
export const SAMPLE_ROLES: JobDescription[] = [
  {
    title: 'Frontend Developer',
    requiredSkills: ['JavaScript', 'React', 'HTML', 'CSS'],
    preferredSkills: ['TypeScript', 'Vue.js', 'SASS'],
    requiredExperienceYears: 2,
  },
  {
    title: 'Full Stack Developer',
    requiredSkills: ['JavaScript', 'Node.js', 'React', 'MongoDB'],
    preferredSkills: ['Python', 'AWS', 'Docker'],
    requiredExperienceYears: 3,
  },
  {
    title: 'Backend Developer',
    requiredSkills: ['Python', 'Django', 'PostgreSQL', 'REST API'],
    preferredSkills: ['Redis', 'Celery', 'AWS'],
    requiredExperienceYears: 3,
  },
  {
    title: 'DevOps Engineer',
    requiredSkills: ['AWS', 'Docker', 'Kubernetes', 'CI/CD'],
    preferredSkills: ['Terraform', 'Ansible', 'Monitoring'],
    requiredExperienceYears: 4,
  },
];

export interface RoleMatch {
  role: JobDescription;
  fitScore: number;
  skillMatch: number;
  experienceMatch: number;
  suitability: string;
  missingSkills: string[];
  recommendations: string[];
  engine: EngineID | null;
  degraded: boolean;
}

/** POST /job-fit/analyze */
export function handleJobFit(deps: ApiDeps) {
  return asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const body = jobFitRequestSchema.parse(req.body);
    const signal = abortOnClose(res);
    const routed = await invokeWithDefault(
      deps,
      'job_fit',
      body,
      () => fallbackJobFit(body.candidate, body.job),
      { signal },
    );
    sendOk(res, `Job fit analyzed for '${body.job.title}'`, routed);
  });
}

/**
 * POST /job-fit/role-matching
 *
 * Runs a routed fit analysis per role, one after another, and ranks the
 * roles by overall fit (ties keep request order).
 */
export function handleRoleMatching(deps: ApiDeps) {
  return asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const body = roleMatchingRequestSchema.parse(req.body);
    const roles = body.roles ?? SAMPLE_ROLES;
    const signal = abortOnClose(res);

    const matches: RoleMatch[] = [];
    for (const role of roles) {
      const routed = await invokeWithDefault(
        deps,
        'job_fit',
        { candidate: body.candidate, job: role },
        () => fallbackJobFit(body.candidate, role),
        { signal },
      );
      const analysis = routed.result;
      matches.push({
        role,
        fitScore: analysis.overallFitScore,
        skillMatch: analysis.skillMatchPercentage,
        experienceMatch: analysis.experienceMatchPercentage,
        suitability: analysis.roleSuitability,
        missingSkills: analysis.missingRequiredSkills.slice(0, 3),
        recommendations: analysis.recommendations.slice(0, 2),
        engine: routed.engine,
        degraded: routed.degraded,
      });
    }

    matches.sort((a, b) => b.fitScore - a.fitScore);
    sendOk(res, `Ranked ${matches.length} roles`, { matches });
  });
}
