import React from 'react';
import {
  Box,
  FormControl,
  InputLabel,
  LinearProgress,
  MenuItem,
  Select,
  type SelectChangeEvent,
  Typography,
} from '@mui/material';
import type { VersionOption } from '../types';

interface SelectionSidebarProps {
  years: number[];
  makes: string[];
  versions: VersionOption[];
  selectedYear: number | null;
  selectedMake: string | null;
  selectedVersion: string | null;
  loadingListing: boolean;
  showMakes: boolean;
  onYearChange: (year: number | null) => void;
  onMakeChange: (make: string | null) => void;
  onVersionChange: (version: string | null) => void;
}

const selectSx = {
  backgroundColor: 'white',
  '& .MuiSelect-select': {
    py: 1.5,
  },
};

const valueOrNull = (event: SelectChangeEvent) => (event.target.value === '' ? null : event.target.value);

const SelectionSidebar: React.FC<SelectionSidebarProps> = ({
  years,
  makes,
  versions,
  selectedYear,
  selectedMake,
  selectedVersion,
  loadingListing,
  showMakes,
  onYearChange,
  onMakeChange,
  onVersionChange,
}) => {
  const handleYearChange = (event: SelectChangeEvent) => {
    const value = valueOrNull(event);
    onYearChange(value === null ? null : Number(value));
  };

  return (
    <Box sx={{ display: 'flex', flexDirection: 'column', gap: 2 }}>
      <Typography variant="h6" sx={{ fontWeight: 600 }}>
        Filter Options
      </Typography>

      {/* Year Dropdown */}
      <Box sx={{ position: 'relative' }}>
        <FormControl fullWidth variant="outlined" disabled={loadingListing}>
          <InputLabel id="year-label">
            {loadingListing ? 'Loading letters...' : 'Select Year'}
          </InputLabel>
          <Select
            labelId="year-label"
            value={selectedYear === null ? '' : String(selectedYear)}
            onChange={handleYearChange}
            label={loadingListing ? 'Loading letters...' : 'Select Year'}
            sx={selectSx}
          >
            <MenuItem value="">
              <em>Choose a year...</em>
            </MenuItem>
            {years.map((year) => (
              <MenuItem key={year} value={String(year)}>
                {year}
              </MenuItem>
            ))}
          </Select>
          {loadingListing && (
            <LinearProgress
              sx={{
                position: 'absolute',
                bottom: 1,
                left: '1.5%',
                width: '97%',
                height: 2,
              }}
            />
          )}
        </FormControl>
      </Box>

      {showMakes && (
        <>
          {/* Make Dropdown */}
          <FormControl fullWidth variant="outlined">
            <InputLabel id="make-label">Select Make</InputLabel>
            <Select
              labelId="make-label"
              value={selectedMake ?? ''}
              onChange={(event) => onMakeChange(valueOrNull(event))}
              label="Select Make"
              sx={selectSx}
            >
              <MenuItem value="">
                <em>Choose a make...</em>
              </MenuItem>
              {makes.map((make) => (
                <MenuItem key={make} value={make}>
                  {make}
                </MenuItem>
              ))}
            </Select>
          </FormControl>

          {/* Version Dropdown */}
          {selectedMake !== null && (
            <FormControl fullWidth variant="outlined">
              <InputLabel id="version-label">Select Version</InputLabel>
              <Select
                labelId="version-label"
                value={selectedVersion ?? ''}
                onChange={(event) => onVersionChange(valueOrNull(event))}
                label="Select Version"
                sx={selectSx}
              >
                <MenuItem value="">
                  <em>Choose a version...</em>
                </MenuItem>
                {versions.map((option, index) => (
                  <MenuItem key={`${option.label}-${index}`} value={option.label}>
                    {option.label}
                  </MenuItem>
                ))}
              </Select>
            </FormControl>
          )}
        </>
      )}

    </Box>
  );
};

export default SelectionSidebar;
