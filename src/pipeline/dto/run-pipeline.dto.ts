import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsInt, IsOptional, Matches, Min } from 'class-validator';

export class RunPipelineDto {
  @ApiPropertyOptional({
    description: 'Repository to analyze; defaults to GITHUB_REPO',
    example: 'octocat/hello-world',
  })
  @IsOptional()
  @Matches(/^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/, {
    message: 'repo must be in the format owner/repo_name',
  })
  repo?: string;

  @ApiPropertyOptional({ description: 'Trailing window in months; defaults to MONTHS', example: 6 })
  @IsOptional()
  @IsInt()
  @Min(1)
  monthsBack?: number;
}
